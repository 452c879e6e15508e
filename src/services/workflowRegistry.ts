import { WorkflowEngine } from './workflow/engine';
import { ProgressSink, RunOptions, WorkflowResult } from './workflow/types';

export type AnyWorkflowResult = WorkflowResult<object, unknown>;

export interface PreparedRun {
  start(progress?: ProgressSink, options?: RunOptions): Promise<AnyWorkflowResult>;
}

export interface WorkflowSummary {
  name: string;
  description: string;
  nodes: string[];
}

export interface RegisteredWorkflow extends WorkflowSummary {
  /**
   * Validate the input; throws a ZodError when it does not match. Undeclared
   * state fields are caught later: `start` throws UnknownFieldError
   * synchronously, before any node executes.
   */
  prepare(input: unknown): PreparedRun;
}

export interface WorkflowRegistration<S extends object, C, O> {
  description: string;
  engine: WorkflowEngine<S, C, O>;
  toState: (input: unknown) => Partial<S>;
}

export class WorkflowRegistry {
  private readonly workflows = new Map<string, RegisteredWorkflow>();

  register<S extends object, C, O>(registration: WorkflowRegistration<S, C, O>): this {
    const { engine, toState, description } = registration;
    const name = engine.graph.name;
    if (this.workflows.has(name)) {
      throw new Error(`Workflow already registered: ${name}`);
    }
    this.workflows.set(name, {
      name,
      description,
      nodes: engine.graph.nodeNames(),
      prepare: (input) => {
        const initial = toState(input);
        return {
          start: (progress, options) => engine.createRun(initial, progress, options).start(),
        };
      },
    });
    return this;
  }

  get(name: string): RegisteredWorkflow | undefined {
    return this.workflows.get(name);
  }

  list(): WorkflowSummary[] {
    return [...this.workflows.values()].map(({ name, description, nodes }) => ({
      name,
      description,
      nodes,
    }));
  }
}
