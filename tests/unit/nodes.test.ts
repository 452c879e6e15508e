import { isAgentEnabled, skippable, SKIPPED_BY_USER } from '../../src/services/workflow/nodes';
import { NodeContext, NodeDefinition } from '../../src/services/workflow/types';

interface ToggleState {
  enabled: boolean;
  result: string;
}

const context: NodeContext<null> = {
  collaborators: null,
  runId: 'run-1',
  step: 1,
  signal: new AbortController().signal,
};

describe('skippable', () => {
  const run = jest.fn(async () => ({ result: 'ran' }));
  const node: NodeDefinition<ToggleState, null> = { name: 'work', writes: ['result'], run };
  const wrapped = skippable(node, {
    isEnabled: (state) => state.enabled,
    onSkip: () => ({ result: SKIPPED_BY_USER }),
  });

  beforeEach(() => {
    run.mockClear();
  });

  it('runs the node when enabled', async () => {
    await expect(wrapped.run({ enabled: true, result: '' }, context)).resolves.toEqual({ result: 'ran' });
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('writes the skip update without running the node when disabled', async () => {
    await expect(wrapped.run({ enabled: false, result: '' }, context)).resolves.toEqual({
      result: 'skipped_by_user',
    });
    expect(run).not.toHaveBeenCalled();
  });

  it('keeps the node name and declared writes', () => {
    expect(wrapped.name).toBe('work');
    expect(wrapped.writes).toEqual(['result']);
  });
});

describe('isAgentEnabled', () => {
  it('treats an empty selection as all agents', () => {
    expect(isAgentEnabled([], 'ux')).toBe(true);
  });

  it('checks membership otherwise', () => {
    expect(isAgentEnabled(['visual'], 'visual')).toBe(true);
    expect(isAgentEnabled(['visual'], 'ux')).toBe(false);
  });
});
