import { randomUUID } from 'crypto';
import logger from '../../utils/logger';
import { MetricsRecorder, metrics as globalMetrics } from '../../utils/metrics';
import {
  NodeExecutionError,
  NodeTimeoutError,
  StepLimitError,
  isWorkflowError,
  toNodeError,
} from './errors';
import { CompiledWorkflow } from './graph';
import { StateContainer } from './stateContainer';
import {
  END,
  NodeDefinition,
  ProgressEvent,
  ProgressSink,
  RunOptions,
  RunStatus,
  StateView,
  TraceEntry,
  WorkflowFailure,
  WorkflowResult,
} from './types';

/**
 * Runs a compiled workflow with a fixed set of collaborators. The engine is
 * stateless between runs; each run gets its own `WorkflowRun`.
 */
export class WorkflowEngine<S extends object, C, O> {
  readonly graph: CompiledWorkflow<S, C, O>;
  private readonly collaborators: C;
  private readonly metrics: MetricsRecorder;

  constructor(graph: CompiledWorkflow<S, C, O>, collaborators: C, metrics?: MetricsRecorder) {
    this.graph = graph;
    this.collaborators = collaborators;
    this.metrics = metrics || globalMetrics;
  }

  /**
   * Validates the initial state and returns a run that has not started yet.
   * Unknown initial fields throw here, before any node executes.
   */
  createRun(
    initialState: Partial<S>,
    progress?: ProgressSink,
    options: RunOptions = {},
  ): WorkflowRun<S, C, O> {
    const container = new StateContainer(this.graph.state, initialState);
    return new WorkflowRun(this.graph, this.collaborators, container, this.metrics, progress, options);
  }

  run(
    initialState: Partial<S>,
    progress?: ProgressSink,
    options: RunOptions = {},
  ): Promise<WorkflowResult<S, O>> {
    return this.createRun(initialState, progress, options).start();
  }
}

export class WorkflowRun<S extends object, C, O> {
  readonly runId: string;
  private _status: RunStatus = 'not_started';
  private _currentNode?: string;
  private readonly trace: TraceEntry[] = [];
  private readonly progress: ProgressEvent[] = [];
  private steps = 0;

  constructor(
    private readonly graph: CompiledWorkflow<S, C, O>,
    private readonly collaborators: C,
    private readonly container: StateContainer<S>,
    private readonly metrics: MetricsRecorder,
    private readonly sink: ProgressSink | undefined,
    private readonly options: RunOptions,
  ) {
    this.runId = options.runId || randomUUID();
  }

  get status(): RunStatus {
    return this._status;
  }

  /** The node being executed while the run is `running`. */
  get currentNode(): string | undefined {
    return this._currentNode;
  }

  async start(): Promise<WorkflowResult<S, O>> {
    if (this._status !== 'not_started') {
      throw new Error(`Run ${this.runId} was already started`);
    }
    this._status = 'running';
    const { maxSteps } = this.graph.policies;
    let current = this.graph.entryPoint;

    logger.info('Workflow run started', { graph: this.graph.name, runId: this.runId });
    this.metrics.increment('workflow.run.started', { graph: this.graph.name });

    while (current !== END) {
      if (this.options.signal?.aborted) {
        return this.cancel(current);
      }
      if (this.steps >= maxSteps) {
        return this.fail(new StepLimitError(maxSteps, current), current);
      }

      this._currentNode = current;
      this.steps += 1;
      const started = Date.now();

      let node: NodeDefinition<S, C>;
      try {
        node = await this.execute(current);
      } catch (error) {
        this.record(current, started, error);
        if (this.options.signal?.aborted) {
          return this.cancel(current);
        }
        return this.fail(error, current);
      }
      this.record(current, started);
      this.metrics.increment('workflow.node.completed', { graph: this.graph.name, node: current });
      await this.checkpoint(current, this.container.snapshot());

      // The node itself succeeded; a routing error is reported against it
      // without a second trace entry.
      let next: string;
      try {
        next = this.graph.next(current, this.container.view());
      } catch (error) {
        this.emit(node, this.steps);
        return this.fail(error, current);
      }
      const remaining = this.graph.remainingSteps(next, this.container.view(), maxSteps - this.steps);
      this.emit(node, this.steps + remaining);
      current = next;
    }

    this._currentNode = undefined;
    this._status = 'completed';
    logger.info('Workflow run completed', {
      graph: this.graph.name,
      runId: this.runId,
      steps: this.steps,
    });
    this.metrics.increment('workflow.run.completed', { graph: this.graph.name });
    return this.result(null);
  }

  private async execute(name: string): Promise<NodeDefinition<S, C>> {
    const node = this.graph.node(name);
    const update = await this.invoke(node, this.container.view());
    this.assertWrites(node, update);
    this.container.apply(update, `node ${node.name}`);
    return node;
  }

  private invoke(node: NodeDefinition<S, C>, state: StateView<S>): Promise<Partial<S>> {
    const timeoutMs = node.timeoutMs ?? this.graph.policies.stepTimeoutMs;
    const controller = new AbortController();
    const runSignal = this.options.signal;

    return new Promise<Partial<S>>((resolve, reject) => {
      // Cancellation does not wait for the node to settle; see RunOptions.signal.
      const onAbort = () => {
        clearTimeout(timer);
        controller.abort(runSignal?.reason);
        reject(new NodeExecutionError(node.name, 'cancelled'));
      };
      runSignal?.addEventListener('abort', onAbort, { once: true });
      const timer = setTimeout(() => {
        runSignal?.removeEventListener('abort', onAbort);
        controller.abort();
        reject(new NodeTimeoutError(node.name, timeoutMs));
      }, timeoutMs);
      const settle = () => {
        clearTimeout(timer);
        runSignal?.removeEventListener('abort', onAbort);
      };

      Promise.resolve()
        .then(() =>
          node.run(state, {
            collaborators: this.collaborators,
            runId: this.runId,
            step: this.steps,
            signal: controller.signal,
          }),
        )
        .then(
          (update) => {
            settle();
            resolve(update);
          },
          (error) => {
            settle();
            reject(toNodeError(node.name, error));
          },
        );
    });
  }

  private assertWrites(node: NodeDefinition<S, C>, update: Partial<S>): void {
    if (!node.writes) return;
    const allowed = new Set<string>(node.writes);
    for (const key of Object.keys(update)) {
      if (this.container.has(key) && !allowed.has(key)) {
        throw new NodeExecutionError(node.name, `wrote field "${key}" outside its declared writes`);
      }
    }
  }

  private async checkpoint(node: string, state: Readonly<S>): Promise<void> {
    const checkpointer = this.options.checkpointer;
    if (!checkpointer) return;
    try {
      await checkpointer.save(this.graph.name, node, state, this.runId);
    } catch (error) {
      logger.warn('Failed to save workflow checkpoint', {
        graph: this.graph.name,
        runId: this.runId,
        node,
        error: error instanceof Error ? error.message : String(error),
      });
      this.metrics.increment('workflow.checkpoint.failed', { graph: this.graph.name });
    }
  }

  private emit(node: NodeDefinition<S, C>, totalSteps: number): void {
    const event: ProgressEvent = {
      runId: this.runId,
      step: this.steps,
      totalSteps,
      node: node.name,
      label: node.label || node.name,
      timestamp: new Date().toISOString(),
    };
    this.progress.push(event);
    if (!this.sink) return;
    try {
      this.sink(event);
    } catch (error) {
      logger.warn('Progress sink failed', {
        runId: this.runId,
        node: node.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private record(node: string, started: number, error?: unknown): void {
    const ended = Date.now();
    this.trace.push({
      node,
      startedAt: new Date(started).toISOString(),
      endedAt: new Date(ended).toISOString(),
      durationMs: ended - started,
      ...(error !== undefined
        ? { error: error instanceof Error ? error.message : String(error) }
        : {}),
    });
  }

  private cancel(node: string): WorkflowResult<S, O> {
    this._status = 'cancelled';
    this._currentNode = undefined;
    logger.warn('Workflow run cancelled', { graph: this.graph.name, runId: this.runId, node });
    this.metrics.increment('workflow.run.cancelled', { graph: this.graph.name });
    return this.result({ code: 'CANCELLED', message: 'Workflow run was cancelled', node });
  }

  private fail(error: unknown, node: string): WorkflowResult<S, O> {
    this._status = 'failed';
    this._currentNode = undefined;
    const failure = toFailure(error, node);

    logger.error('Workflow run failed', {
      graph: this.graph.name,
      runId: this.runId,
      node,
      code: failure.code,
      message: failure.message,
    });
    this.metrics.increment('workflow.node.failed', { graph: this.graph.name, node });
    this.metrics.increment('workflow.run.failed', { graph: this.graph.name });

    try {
      const update = this.graph.failureUpdate(this.container.snapshot(), failure);
      if (update) {
        this.container.apply(update, 'failure handler');
      }
    } catch (handlerError) {
      logger.error('Workflow failure handler failed', {
        graph: this.graph.name,
        runId: this.runId,
        error: handlerError instanceof Error ? handlerError.message : String(handlerError),
      });
    }

    return this.result(failure);
  }

  private result(error: WorkflowFailure | null): WorkflowResult<S, O> {
    const state = this.container.snapshot();
    const status = this._status;
    return {
      runId: this.runId,
      graph: this.graph.name,
      status: status === 'failed' || status === 'cancelled' ? status : 'completed',
      state,
      output: status === 'cancelled' ? undefined : this.graph.output(state),
      error,
      progress: [...this.progress],
      trace: [...this.trace],
      steps: this.steps,
    };
  }
}

function toFailure(error: unknown, node: string): WorkflowFailure {
  if (isWorkflowError(error)) {
    return {
      code: error.code,
      message: error.message,
      node: error instanceof NodeExecutionError ? error.node : node,
    };
  }
  return {
    code: 'NODE_EXECUTION',
    message: `Node ${node} failed: ${error instanceof Error ? error.message : String(error)}`,
    node,
  };
}
