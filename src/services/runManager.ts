import { randomUUID } from 'crypto';
import { Sentry } from '../sentry';
import logger from '../utils/logger';
import { ProgressBus } from '../utils/progressBus';
import { AnyWorkflowResult, WorkflowRegistry } from './workflowRegistry';
import { busProgressSink, collectingSink, combineSinks, loggerProgressSink } from './workflow/progress';
import { Checkpointer, ProgressEvent, RunStatus, TraceEntry, WorkflowFailure } from './workflow/types';

export interface RunRecord {
  runId: string;
  workflow: string;
  status: RunStatus;
  createdAt: string;
  finishedAt: string | null;
  progress: ProgressEvent[];
  output: unknown;
  error: WorkflowFailure | null;
  steps: number;
  trace: TraceEntry[];
}

export type CancelOutcome = 'cancelled' | 'not_found' | 'already_finished';

export interface RunManagerOptions {
  historyLimit: number;
  checkpointer?: Checkpointer;
}

export class UnknownWorkflowError extends Error {
  readonly workflow: string;

  constructor(workflow: string) {
    super(`Unknown workflow: ${workflow}`);
    this.name = 'UnknownWorkflowError';
    this.workflow = workflow;
  }
}

/**
 * Starts workflow runs in the background and keeps their records.
 * Finished runs beyond `historyLimit` are evicted oldest first; running
 * runs are never evicted.
 */
export class RunManager {
  private readonly runs = new Map<string, RunRecord>();
  private readonly controllers = new Map<string, AbortController>();
  private readonly pending = new Map<string, Promise<void>>();

  constructor(
    private readonly registry: WorkflowRegistry,
    private readonly bus: ProgressBus,
    private readonly options: RunManagerOptions,
  ) {}

  /**
   * Validate the input and launch a run. Throws UnknownWorkflowError or the
   * validation error; otherwise returns the running record immediately.
   */
  start(workflowName: string, input: unknown): RunRecord {
    const workflow = this.registry.get(workflowName);
    if (!workflow) {
      throw new UnknownWorkflowError(workflowName);
    }
    const prepared = workflow.prepare(input);

    const runId = randomUUID();
    const controller = new AbortController();
    const record: RunRecord = {
      runId,
      workflow: workflowName,
      status: 'running',
      createdAt: new Date().toISOString(),
      finishedAt: null,
      progress: [],
      output: undefined,
      error: null,
      steps: 0,
      trace: [],
    };
    const sink = combineSinks(
      collectingSink(record.progress),
      busProgressSink(this.bus),
      loggerProgressSink,
    );

    // Throws synchronously for undeclared state fields, before the run is recorded.
    const running = prepared.start(sink, {
      runId,
      signal: controller.signal,
      checkpointer: this.options.checkpointer,
    });

    this.runs.set(runId, record);
    this.controllers.set(runId, controller);
    this.evict();

    const done = running
      .then(
        (result) => this.finish(record, result),
        (error: unknown) => this.crash(record, error),
      )
      .finally(() => {
        this.controllers.delete(runId);
        this.pending.delete(runId);
        this.evict();
      });
    this.pending.set(runId, done);

    logger.info('Workflow run accepted', { runId, workflow: workflowName });
    return record;
  }

  get(runId: string): RunRecord | undefined {
    return this.runs.get(runId);
  }

  list(): RunRecord[] {
    return [...this.runs.values()];
  }

  cancel(runId: string): CancelOutcome {
    const record = this.runs.get(runId);
    if (!record) return 'not_found';
    const controller = this.controllers.get(runId);
    if (record.status !== 'running' || !controller) return 'already_finished';
    controller.abort();
    logger.info('Workflow run cancellation requested', { runId });
    return 'cancelled';
  }

  /** Resolves once the run has settled; used by tests and shutdown. */
  async waitFor(runId: string): Promise<RunRecord | undefined> {
    await this.pending.get(runId);
    return this.runs.get(runId);
  }

  /** Cancel everything still running and wait for it to settle. */
  async shutdown(): Promise<void> {
    for (const controller of this.controllers.values()) {
      controller.abort();
    }
    await Promise.all(this.pending.values());
  }

  private finish(record: RunRecord, result: AnyWorkflowResult): void {
    record.status = result.status;
    record.finishedAt = new Date().toISOString();
    record.output = result.output;
    record.error = result.error;
    record.steps = result.steps;
    record.trace = result.trace;

    if (result.status === 'failed' && result.error) {
      Sentry.captureException(new Error(result.error.message), {
        tags: { workflow: record.workflow, code: result.error.code },
        extra: { runId: record.runId, node: result.error.node },
      });
    }
    this.bus.publishFinished(record.runId, record.status, record.error);
  }

  private crash(record: RunRecord, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Workflow run crashed', { runId: record.runId, workflow: record.workflow, error: message });
    Sentry.captureException(error);
    record.status = 'failed';
    record.finishedAt = new Date().toISOString();
    record.error = { code: 'NODE_EXECUTION', message };
    this.bus.publishFinished(record.runId, record.status, record.error);
  }

  private evict(): void {
    let excess = this.runs.size - this.options.historyLimit;
    if (excess <= 0) return;
    for (const [runId, record] of this.runs) {
      if (excess <= 0) break;
      if (record.status === 'running') continue;
      this.runs.delete(runId);
      excess -= 1;
    }
  }
}
