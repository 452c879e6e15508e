import { z, ZodError } from 'zod';
import { WorkflowRegistry } from '../../src/services/workflowRegistry';
import { WorkflowEngine } from '../../src/services/workflow/engine';
import { UnknownFieldError } from '../../src/services/workflow/errors';
import { WorkflowGraph } from '../../src/services/workflow/graph';
import { defineState } from '../../src/services/workflow/stateSchema';
import { END } from '../../src/services/workflow/types';
import { MetricsRecorder } from '../../src/utils/metrics';

interface NoteState {
  text: string;
}

const noteState = defineState<NoteState>(() => ({ text: '' }));

function notesRegistry(toState: (input: unknown) => Partial<NoteState>) {
  const run = jest.fn(async () => ({ text: 'done' }));
  const graph = new WorkflowGraph<NoteState, null>('notes', noteState)
    .addNode({ name: 'write', run })
    .setEntryPoint('write')
    .addEdge('write', END)
    .compile();
  const workflows = new WorkflowRegistry().register({
    description: 'Writes a note',
    engine: new WorkflowEngine(graph, null, new MetricsRecorder()),
    toState,
  });
  return { workflows, run };
}

describe('WorkflowRegistry', () => {
  it('lists registered workflows with their nodes', () => {
    const { workflows } = notesRegistry(() => ({}));
    expect(workflows.list()).toEqual([{ name: 'notes', description: 'Writes a note', nodes: ['write'] }]);
    expect(workflows.get('missing')).toBeUndefined();
  });

  it('refuses a second workflow with the same name', () => {
    const { workflows } = notesRegistry(() => ({}));
    const graph = new WorkflowGraph<NoteState, null>('notes', noteState)
      .addNode({ name: 'write', run: async () => ({}) })
      .setEntryPoint('write')
      .addEdge('write', END)
      .compile();

    expect(() =>
      workflows.register({
        description: 'Again',
        engine: new WorkflowEngine(graph, null, new MetricsRecorder()),
        toState: () => ({}),
      }),
    ).toThrow('Workflow already registered: notes');
  });

  it('throws a ZodError from prepare for input that does not match', () => {
    const { workflows, run } = notesRegistry((input) => z.object({ text: z.string() }).parse(input));

    expect(() => workflows.get('notes')?.prepare({ text: 4 })).toThrow(ZodError);
    expect(run).not.toHaveBeenCalled();
  });

  it('throws UnknownFieldError synchronously from start for undeclared fields', () => {
    const withExtra = { text: 'hi', extra: true };
    const { workflows, run } = notesRegistry(() => withExtra);
    const prepared = workflows.get('notes')?.prepare({});

    expect(prepared).toBeDefined();
    expect(() => prepared?.start()).toThrow(UnknownFieldError);
    expect(run).not.toHaveBeenCalled();
  });

  it('starts a prepared run', async () => {
    const { workflows, run } = notesRegistry(() => ({ text: 'draft' }));
    const result = await workflows.get('notes')?.prepare({}).start();

    expect(result?.status).toBe('completed');
    expect(result?.state).toEqual({ text: 'done' });
    expect(run).toHaveBeenCalledTimes(1);
  });
});
