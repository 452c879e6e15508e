import logger from '../../utils/logger';
import { NodeDefinition, StateView } from './types';

export const SKIPPED_BY_USER = 'skipped_by_user';

export interface SkipOptions<S> {
  isEnabled: (state: StateView<S>) => boolean;
  /** Update written instead of running the node. */
  onSkip: (state: StateView<S>) => Partial<S>;
}

/**
 * Wrap a node so it can be switched off per run. A skipped node still
 * counts as executed and still reports progress.
 */
export function skippable<S, C>(
  node: NodeDefinition<S, C>,
  options: SkipOptions<S>,
): NodeDefinition<S, C> {
  return {
    ...node,
    run: async (state, context) => {
      if (!options.isEnabled(state)) {
        logger.debug('Skipping disabled node', { node: node.name, runId: context.runId });
        return options.onSkip(state);
      }
      return node.run(state, context);
    },
  };
}

/** An empty selection enables every agent. */
export function isAgentEnabled(enabled: readonly string[], agent: string): boolean {
  return enabled.length === 0 || enabled.includes(agent);
}
