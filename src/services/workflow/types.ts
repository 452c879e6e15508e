import { WorkflowErrorCode } from './errors';

export const END = '__end__';

/** Readonly all the way down; what nodes and routers see of the state. */
export type DeepReadonly<T> = T extends (...args: never[]) => unknown
  ? T
  : T extends ReadonlyArray<infer U>
    ? ReadonlyArray<DeepReadonly<U>>
    : T extends object
      ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
      : T;

export type StateView<S> = DeepReadonly<S>;

export interface NodeContext<C> {
  collaborators: C;
  runId: string;
  step: number;
  /** Fires when the node times out or the run is cancelled. */
  signal: AbortSignal;
}

export type NodeHandler<S, C> = (
  state: StateView<S>,
  context: NodeContext<C>,
) => Promise<Partial<S>>;

export interface NodeDefinition<S, C> {
  name: string;
  /** Display name used in progress events. */
  label?: string;
  reads?: ReadonlyArray<keyof S & string>;
  writes?: ReadonlyArray<keyof S & string>;
  timeoutMs?: number;
  run: NodeHandler<S, C>;
}

export type Router<S> = (state: StateView<S>) => string;

export type EdgeDefinition<S> =
  | { kind: 'direct'; to: string }
  | { kind: 'conditional'; router: Router<S>; pathMap?: Record<string, string> };

export interface ProgressEvent {
  runId: string;
  step: number;
  totalSteps: number;
  node: string;
  label: string;
  timestamp: string;
}

export type ProgressSink = (event: ProgressEvent) => void;

export interface TraceEntry {
  node: string;
  startedAt: string;
  endedAt: string;
  durationMs: number;
  error?: string;
}

export type RunStatus = 'not_started' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface WorkflowFailure {
  code: WorkflowErrorCode | 'CANCELLED';
  message: string;
  node?: string;
}

export interface WorkflowResult<S, O> {
  runId: string;
  graph: string;
  status: Exclude<RunStatus, 'not_started' | 'running'>;
  state: Readonly<S>;
  /** The graph's declared output field, final or degraded. */
  output: O | undefined;
  error: WorkflowFailure | null;
  progress: ProgressEvent[];
  trace: TraceEntry[];
  steps: number;
}

export interface Checkpointer {
  save(graphId: string, nodeId: string, state: unknown, runId?: string): Promise<void>;
}

export interface RunOptions {
  runId?: string;
  /**
   * Cancels the run. An abort while a node is in flight aborts the node's
   * own signal and returns `cancelled` without waiting for the node to
   * settle; whatever the node later returns is discarded.
   */
  signal?: AbortSignal;
  checkpointer?: Checkpointer;
}
