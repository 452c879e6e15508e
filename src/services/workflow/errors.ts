/**
 * Workflow error taxonomy.
 *
 * Definition errors (unknown fields, unknown nodes, malformed graphs) are
 * raised while a graph is compiled or a run is being set up. Everything a
 * node does wrong at run time ends up as a failed run instead of a throw.
 */

export type WorkflowErrorCode =
  | 'UNKNOWN_FIELD'
  | 'UNKNOWN_NODE'
  | 'GRAPH_DEFINITION'
  | 'STEP_LIMIT'
  | 'NODE_EXECUTION'
  | 'NODE_TIMEOUT'
  | 'AGGREGATOR_CONFIG';

export class WorkflowError extends Error {
  readonly code: WorkflowErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: WorkflowErrorCode,
    options?: { cause?: unknown; context?: Record<string, unknown> },
  ) {
    super(message);
    this.name = 'WorkflowError';
    this.code = code;
    this.context = options?.context;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * An update or initial state referenced a field the state definition does
 * not declare.
 */
export class UnknownFieldError extends WorkflowError {
  readonly field: string;

  constructor(field: string, source?: string) {
    super(
      source
        ? `Unknown state field "${field}" written by ${source}`
        : `Unknown state field "${field}"`,
      'UNKNOWN_FIELD',
      { context: { field, source } },
    );
    this.name = 'UnknownFieldError';
    this.field = field;
  }
}

export class UnknownNodeError extends WorkflowError {
  readonly node: string;

  constructor(node: string, referencedBy?: string) {
    super(
      referencedBy
        ? `Graph node not found: ${node} (referenced by ${referencedBy})`
        : `Graph node not found: ${node}`,
      'UNKNOWN_NODE',
      { context: { node, referencedBy } },
    );
    this.name = 'UnknownNodeError';
    this.node = node;
  }
}

export class GraphDefinitionError extends WorkflowError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'GRAPH_DEFINITION', { context });
    this.name = 'GraphDefinitionError';
  }
}

export class StepLimitError extends WorkflowError {
  readonly maxSteps: number;

  constructor(maxSteps: number, node: string) {
    super(`Workflow exceeded max steps (${maxSteps}) before ${node}`, 'STEP_LIMIT', {
      context: { maxSteps, node },
    });
    this.name = 'StepLimitError';
    this.maxSteps = maxSteps;
  }
}

export class NodeExecutionError extends WorkflowError {
  readonly node: string;

  constructor(
    node: string,
    message: string,
    options?: { cause?: unknown; code?: WorkflowErrorCode },
  ) {
    super(`Node ${node} failed: ${message}`, options?.code ?? 'NODE_EXECUTION', {
      cause: options?.cause,
      context: { node },
    });
    this.name = 'NodeExecutionError';
    this.node = node;
  }
}

export class NodeTimeoutError extends NodeExecutionError {
  readonly timeoutMs: number;

  constructor(node: string, timeoutMs: number) {
    super(node, `timed out after ${timeoutMs}ms`, { code: 'NODE_TIMEOUT' });
    this.name = 'NodeTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class AggregatorConfigError extends WorkflowError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'AGGREGATOR_CONFIG', { context });
    this.name = 'AggregatorConfigError';
  }
}

export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}

/**
 * Wrap whatever a node threw so the run records which node failed.
 */
export function toNodeError(node: string, error: unknown): NodeExecutionError {
  if (error instanceof NodeExecutionError) {
    return error;
  }
  if (error instanceof Error) {
    return new NodeExecutionError(node, error.message, { cause: error });
  }
  return new NodeExecutionError(node, String(error));
}
