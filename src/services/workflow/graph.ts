import {
  GraphDefinitionError,
  UnknownFieldError,
  UnknownNodeError,
} from './errors';
import { DEFAULT_POLICIES, GraphPolicies, assertNodeExists, findCycle } from './policies';
import { StateDefinition, fieldNames } from './stateSchema';
import {
  END,
  EdgeDefinition,
  NodeDefinition,
  Router,
  StateView,
  WorkflowFailure,
} from './types';

export interface CompileOptions<S, O> {
  /** Required when the graph can loop. */
  maxSteps?: number;
  stepTimeoutMs?: number;
  /** Reads the workflow's result out of the final state. */
  output?: (state: Readonly<S>) => O | undefined;
  /** Update applied to the partial state when a run fails. */
  onFailure?: (state: Readonly<S>, failure: WorkflowFailure) => Partial<S>;
}

/**
 * Builder for a workflow graph. Nothing is validated until `compile`, so
 * nodes and edges can be declared in any order.
 */
export class WorkflowGraph<S extends object, C> {
  readonly name: string;
  readonly state: StateDefinition<S>;
  private readonly nodes = new Map<string, NodeDefinition<S, C>>();
  private readonly edges = new Map<string, EdgeDefinition<S>>();
  private entryPoint?: string;

  constructor(name: string, state: StateDefinition<S>) {
    this.name = name;
    this.state = state;
  }

  addNode(node: NodeDefinition<S, C>): this {
    if (node.name === END) {
      throw new GraphDefinitionError(`Node name ${END} is reserved`);
    }
    if (this.nodes.has(node.name)) {
      throw new GraphDefinitionError(`Duplicate node: ${node.name}`, { node: node.name });
    }
    this.nodes.set(node.name, node);
    return this;
  }

  addEdge(from: string, to: string): this {
    this.setEdge(from, { kind: 'direct', to });
    return this;
  }

  addConditionalEdges(from: string, router: Router<S>, pathMap?: Record<string, string>): this {
    this.setEdge(from, { kind: 'conditional', router, pathMap });
    return this;
  }

  setEntryPoint(node: string): this {
    this.entryPoint = node;
    return this;
  }

  compile<O = undefined>(options: CompileOptions<S, O> = {}): CompiledWorkflow<S, C, O> {
    if (!this.entryPoint) {
      throw new GraphDefinitionError(`Graph ${this.name} has no entry point`);
    }
    if (this.entryPoint === END) {
      throw new GraphDefinitionError(`Graph ${this.name} cannot start at ${END}`);
    }
    assertNodeExists(this.nodes, this.entryPoint, 'entry point');

    for (const [from, edge] of this.edges) {
      assertNodeExists(this.nodes, from, 'edge source');
      for (const to of edgeTargets(edge)) {
        assertNodeExists(this.nodes, to, from);
      }
    }

    const fields = new Set(fieldNames(this.state));
    for (const node of this.nodes.values()) {
      if (!this.edges.has(node.name)) {
        throw new GraphDefinitionError(`Node ${node.name} has no outgoing edge`, {
          node: node.name,
        });
      }
      for (const field of [...(node.reads ?? []), ...(node.writes ?? [])]) {
        if (!fields.has(field)) {
          throw new UnknownFieldError(field, `node ${node.name}`);
        }
      }
    }

    const cycle = findCycle(this.entryPoint, (node) => this.successors(node));
    if (cycle && options.maxSteps === undefined) {
      throw new GraphDefinitionError(
        `Graph ${this.name} can loop (${cycle.join(' -> ')}) and needs an explicit maxSteps`,
        { cycle },
      );
    }

    return new CompiledWorkflow<S, C, O>({
      name: this.name,
      state: this.state,
      nodes: new Map(this.nodes),
      edges: new Map(this.edges),
      entryPoint: this.entryPoint,
      policies: {
        maxSteps: options.maxSteps ?? DEFAULT_POLICIES.maxSteps,
        stepTimeoutMs: options.stepTimeoutMs ?? DEFAULT_POLICIES.stepTimeoutMs,
      },
      output: options.output,
      onFailure: options.onFailure,
    });
  }

  private setEdge(from: string, edge: EdgeDefinition<S>): void {
    if (this.edges.has(from)) {
      throw new GraphDefinitionError(`Node ${from} already has an outgoing edge`, { node: from });
    }
    this.edges.set(from, edge);
  }

  private successors(node: string): string[] {
    const edge = this.edges.get(node);
    if (!edge) return [];
    if (edge.kind === 'conditional' && !edge.pathMap) {
      // An unmapped router may pick any node.
      return [...this.nodes.keys(), END];
    }
    return edgeTargets(edge);
  }
}

function edgeTargets<S>(edge: EdgeDefinition<S>): string[] {
  if (edge.kind === 'direct') return [edge.to];
  return edge.pathMap ? Object.values(edge.pathMap) : [];
}

interface CompiledWorkflowParts<S extends object, C, O> {
  name: string;
  state: StateDefinition<S>;
  nodes: ReadonlyMap<string, NodeDefinition<S, C>>;
  edges: ReadonlyMap<string, EdgeDefinition<S>>;
  entryPoint: string;
  policies: GraphPolicies;
  output?: (state: Readonly<S>) => O | undefined;
  onFailure?: (state: Readonly<S>, failure: WorkflowFailure) => Partial<S>;
}

/**
 * A validated graph. Immutable; one compiled workflow can serve any number
 * of runs.
 */
export class CompiledWorkflow<S extends object, C, O> {
  readonly name: string;
  readonly state: StateDefinition<S>;
  readonly entryPoint: string;
  readonly policies: GraphPolicies;
  private readonly parts: CompiledWorkflowParts<S, C, O>;

  constructor(parts: CompiledWorkflowParts<S, C, O>) {
    this.parts = parts;
    this.name = parts.name;
    this.state = parts.state;
    this.entryPoint = parts.entryPoint;
    this.policies = parts.policies;
  }

  nodeNames(): string[] {
    return [...this.parts.nodes.keys()];
  }

  node(name: string): NodeDefinition<S, C> {
    const node = this.parts.nodes.get(name);
    if (!node) {
      throw new UnknownNodeError(name);
    }
    return node;
  }

  /**
   * Resolve the node that follows `from` for the given state.
   */
  next(from: string, state: StateView<S>): string {
    const edge = this.parts.edges.get(from);
    if (!edge) {
      throw new UnknownNodeError(from);
    }
    if (edge.kind === 'direct') {
      return edge.to;
    }

    const route = edge.router(state);
    const target = edge.pathMap ? edge.pathMap[route] : route;
    if (target === undefined) {
      throw new UnknownNodeError(route, from);
    }
    assertNodeExists(this.parts.nodes, target, from);
    return target;
  }

  /**
   * Number of nodes left when following edges from `from` against the
   * given state, stopping at END, the first revisit, or `limit`.
   */
  remainingSteps(from: string, state: StateView<S>, limit: number): number {
    const seen = new Set<string>();
    let current = from;
    let count = 0;
    while (current !== END && count < limit && !seen.has(current)) {
      seen.add(current);
      count += 1;
      try {
        current = this.next(current, state);
      } catch {
        // A router that cannot decide on the current state ends the
        // projection; the real transition is checked when it runs.
        break;
      }
    }
    return count;
  }

  output(state: Readonly<S>): O | undefined {
    return this.parts.output ? this.parts.output(state) : undefined;
  }

  failureUpdate(state: Readonly<S>, failure: WorkflowFailure): Partial<S> | undefined {
    return this.parts.onFailure ? this.parts.onFailure(state, failure) : undefined;
  }
}
