import { UnknownNodeError } from './errors';
import { END } from './types';

export interface GraphPolicies {
  maxSteps: number;
  stepTimeoutMs: number;
}

/** Used when a graph is compiled without policies; the service passes its own from config. */
export const DEFAULT_POLICIES: Readonly<GraphPolicies> = Object.freeze({
  maxSteps: 25,
  stepTimeoutMs: 60000,
});

export function assertNodeExists(
  nodes: ReadonlySet<string> | ReadonlyMap<string, unknown>,
  node: string,
  referencedBy?: string,
): void {
  if (node !== END && !nodes.has(node)) {
    throw new UnknownNodeError(node, referencedBy);
  }
}

export function detectCycle(path: string[], next: string): boolean {
  return path.includes(next);
}

/**
 * Depth-first search for a cycle reachable from `start`. Returns the cyclic
 * path, or null when every path reaches END.
 */
export function findCycle(
  start: string,
  successors: (node: string) => string[],
): string[] | null {
  const done = new Set<string>();

  const visit = (node: string, path: string[]): string[] | null => {
    if (node === END || done.has(node)) return null;
    if (detectCycle(path, node)) return [...path.slice(path.indexOf(node)), node];
    const nextPath = [...path, node];
    for (const next of successors(node)) {
      const cycle = visit(next, nextPath);
      if (cycle) return cycle;
    }
    done.add(node);
    return null;
  };

  return visit(start, []);
}
