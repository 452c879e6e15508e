import { WorkflowEngine } from './engine';
import { ProgressSink, RunOptions, WorkflowResult } from './types';

/**
 * Single entry point for executing a workflow.
 *
 * Throws only for definition problems in `initialState` (unknown fields),
 * before any node has run. Node failures, timeouts, step-limit breaches and
 * cancellation come back as a result whose `error` is set.
 */
export function runWorkflow<S extends object, C, O>(
  initialState: Partial<S>,
  workflow: WorkflowEngine<S, C, O>,
  progressSink?: ProgressSink,
  options: RunOptions = {},
): Promise<WorkflowResult<S, O>> {
  const run = workflow.createRun(initialState, progressSink, options);
  return run.start();
}

export function isDegraded<S, O>(result: WorkflowResult<S, O>): boolean {
  return result.error !== null;
}
