import { WorkflowEngine } from '../../src/services/workflow/engine';
import { WorkflowGraph } from '../../src/services/workflow/graph';
import { collectingSink } from '../../src/services/workflow/progress';
import { concat, sum } from '../../src/services/workflow/reducers';
import { defineState } from '../../src/services/workflow/stateSchema';
import { Checkpointer, END, NodeDefinition, ProgressEvent } from '../../src/services/workflow/types';
import { MetricsRecorder } from '../../src/utils/metrics';

interface CounterState {
  a: boolean;
  b: boolean;
  count: number;
  log: string[];
  summary: string | null;
  scratch?: string;
}

interface Collaborators {
  greeting: string;
}

const counterState = defineState<CounterState>(
  () => ({ a: false, b: false, count: 0, log: [], summary: null }),
  { count: sum(), log: concat<string>() },
);

type Node = NodeDefinition<CounterState, Collaborators>;

function linear(nodes: Node[], options: { maxSteps?: number } = {}) {
  const graph = new WorkflowGraph<CounterState, Collaborators>('linear', counterState);
  nodes.forEach((node) => graph.addNode(node));
  graph.setEntryPoint(nodes[0].name);
  nodes.forEach((node, index) => graph.addEdge(node.name, nodes[index + 1]?.name ?? END));
  return graph.compile<string>({
    ...options,
    output: (state) => state.summary ?? undefined,
    onFailure: (_state, failure) => ({ summary: `degraded: ${failure.message}` }),
  });
}

const nodeA: Node = { name: 'a', label: 'Step A', run: async () => ({ a: true, log: ['a'] }) };
const nodeB: Node = {
  name: 'b',
  label: 'Step B',
  run: async (_state, { collaborators }) => ({ b: true, log: [collaborators.greeting] }),
};
const summarize: Node = {
  name: 'summarize',
  run: async (state) => ({ summary: state.log.join(',') }),
};

describe('WorkflowEngine', () => {
  it('runs a linear graph and returns the final state and output', async () => {
    const engine = new WorkflowEngine(linear([nodeA, nodeB, summarize]), { greeting: 'hello' }, new MetricsRecorder());
    const result = await engine.run({});

    expect(result.status).toBe('completed');
    expect(result.error).toBeNull();
    expect(result.state).toMatchObject({ a: true, b: true, log: ['a', 'hello'], summary: 'a,hello' });
    expect(result.output).toBe('a,hello');
    expect(result.steps).toBe(3);
    expect(result.graph).toBe('linear');
  });

  it('returns trace entries for each step in order', async () => {
    const engine = new WorkflowEngine(linear([nodeA, nodeB]), { greeting: 'hi' }, new MetricsRecorder());
    const result = await engine.run({});
    expect(result.trace.map((entry) => entry.node)).toEqual(['a', 'b']);
    expect(result.trace.every((entry) => entry.error === undefined)).toBe(true);
  });

  it('labels progress events with the display name, falling back to the node name', async () => {
    const events: ProgressEvent[] = [];
    const engine = new WorkflowEngine(linear([nodeA, summarize]), { greeting: 'hi' }, new MetricsRecorder());
    const result = await engine.run({}, collectingSink(events), { runId: 'run-1' });

    expect(events.map((event) => [event.step, event.totalSteps, event.label])).toEqual([
      [1, 2, 'Step A'],
      [2, 2, 'summarize'],
    ]);
    expect(events.every((event) => event.runId === 'run-1')).toBe(true);
    expect(result.progress).toEqual(events);
  });

  it('stops a loop at maxSteps with a step-limit failure', async () => {
    const tick: Node = { name: 'tick', run: async () => ({ count: 1 }) };
    const graph = new WorkflowGraph<CounterState, Collaborators>('loop', counterState)
      .addNode(tick)
      .setEntryPoint('tick')
      .addEdge('tick', 'tick')
      .compile({ maxSteps: 3 });
    const result = await new WorkflowEngine(graph, { greeting: '' }, new MetricsRecorder()).run({});

    expect(result.status).toBe('failed');
    expect(result.steps).toBe(3);
    expect(result.state.count).toBe(3);
    expect(result.error).toEqual({
      code: 'STEP_LIMIT',
      message: 'Workflow exceeded max steps (3) before tick',
      node: 'tick',
    });
  });

  it('treats a node timeout as a node failure', async () => {
    const slow: Node = {
      name: 'slow',
      timeoutMs: 10,
      run: (_state, { signal }) =>
        new Promise((resolve) => {
          signal.addEventListener('abort', () => resolve({ a: true }));
        }),
    };
    const engine = new WorkflowEngine(linear([nodeA, slow]), { greeting: '' }, new MetricsRecorder());
    const result = await engine.run({});

    expect(result.status).toBe('failed');
    expect(result.error).toEqual({
      code: 'NODE_TIMEOUT',
      message: 'Node slow failed: timed out after 10ms',
      node: 'slow',
    });
    expect(result.trace[1].error).toBe('Node slow failed: timed out after 10ms');
    expect(result.output).toBe('degraded: Node slow failed: timed out after 10ms');
  });

  it('keeps earlier updates when a later node throws', async () => {
    const boom: Node = {
      name: 'boom',
      run: async () => {
        throw new Error('upstream 503');
      },
    };
    const metrics = new MetricsRecorder();
    const engine = new WorkflowEngine(linear([nodeA, boom, nodeB]), { greeting: 'x' }, metrics);
    const result = await engine.run({});

    expect(result.status).toBe('failed');
    expect(result.error).toEqual({
      code: 'NODE_EXECUTION',
      message: 'Node boom failed: upstream 503',
      node: 'boom',
    });
    expect(result.state.a).toBe(true);
    expect(result.state.b).toBe(false);
    expect(result.steps).toBe(2);
    expect(result.progress).toHaveLength(1);
    expect(metrics.get('workflow.node.failed', { graph: 'linear', node: 'boom' })).toBe(1);
    expect(metrics.get('workflow.run.failed', { graph: 'linear' })).toBe(1);
  });

  it('fails the run when a node writes an undeclared field', async () => {
    const rogue: Node = { name: 'rogue', run: async () => ({ scratch: 'untracked' }) };
    const result = await new WorkflowEngine(linear([rogue]), { greeting: '' }, new MetricsRecorder()).run({});

    expect(result.status).toBe('failed');
    expect(result.error?.code).toBe('UNKNOWN_FIELD');
    expect(result.error?.message).toBe('Unknown state field "scratch" written by node rogue');
    expect(result.state).not.toHaveProperty('scratch');
  });

  it('fails the run when a node writes outside its declared writes', async () => {
    const sloppy: Node = { name: 'sloppy', writes: ['a'], run: async () => ({ a: true, b: true }) };
    const result = await new WorkflowEngine(linear([sloppy]), { greeting: '' }, new MetricsRecorder()).run({});

    expect(result.error?.message).toBe('Node sloppy failed: wrote field "b" outside its declared writes');
    expect(result.state.a).toBe(false);
  });

  it('throws for undeclared initial fields before any node runs', () => {
    const run = jest.fn(async () => ({ a: true }));
    const engine = new WorkflowEngine(linear([{ name: 'a', run }]), { greeting: '' }, new MetricsRecorder());
    const initial = { a: true, extra: 1 };

    expect(() => engine.createRun(initial)).toThrow('Unknown state field "extra" written by initial state');
    expect(run).not.toHaveBeenCalled();
  });

  it('cancels between nodes without producing an output', async () => {
    const controller = new AbortController();
    const second = jest.fn(async () => ({ b: true }));
    const engine = new WorkflowEngine(
      linear([nodeA, { name: 'b', run: second }, summarize]),
      { greeting: '' },
      new MetricsRecorder(),
    );
    const result = await engine.run({}, () => controller.abort(), { signal: controller.signal });

    expect(result.status).toBe('cancelled');
    expect(result.error).toEqual({ code: 'CANCELLED', message: 'Workflow run was cancelled', node: 'b' });
    expect(result.output).toBeUndefined();
    expect(result.state.a).toBe(true);
    expect(result.steps).toBe(1);
    expect(second).not.toHaveBeenCalled();
  });

  it('aborts the node signal and discards a late update when cancelled mid-node', async () => {
    const controller = new AbortController();
    const inFlight: { signal?: AbortSignal; finish?: (update: Partial<CounterState>) => void } = {};
    const waiting: Node = {
      name: 'waiting',
      run: (_state, { signal }) =>
        new Promise((resolve) => {
          inFlight.signal = signal;
          inFlight.finish = resolve;
          controller.abort();
        }),
    };
    const engine = new WorkflowEngine(linear([waiting]), { greeting: '' }, new MetricsRecorder());
    const result = await engine.run({}, undefined, { signal: controller.signal });
    inFlight.finish?.({ a: true });

    expect(result.status).toBe('cancelled');
    expect(result.error?.node).toBe('waiting');
    expect(inFlight.signal?.aborted).toBe(true);
    expect(result.state.a).toBe(false);
    expect(result.trace.map((entry) => [entry.node, entry.error])).toEqual([
      ['waiting', 'Node waiting failed: cancelled'],
    ]);
  });

  it('fails once against the routing node when a router names an undeclared node', async () => {
    const events: ProgressEvent[] = [];
    const graph = new WorkflowGraph<CounterState, Collaborators>('misrouted', counterState)
      .addNode(nodeA)
      .addNode(nodeB)
      .setEntryPoint('a')
      .addConditionalEdges('a', () => 'nowhere')
      .addEdge('b', END)
      .compile({ maxSteps: 5 });
    const result = await new WorkflowEngine(graph, { greeting: '' }, new MetricsRecorder()).run(
      {},
      collectingSink(events),
    );

    expect(result.status).toBe('failed');
    expect(result.error).toEqual({
      code: 'UNKNOWN_NODE',
      message: 'Graph node not found: nowhere (referenced by a)',
      node: 'a',
    });
    expect(result.steps).toBe(1);
    expect(result.trace.map((entry) => [entry.node, entry.error])).toEqual([['a', undefined]]);
    expect(events.map((event) => [event.node, event.step, event.totalSteps])).toEqual([['a', 1, 1]]);
    expect(result.state.log).toEqual(['a']);
  });

  it('fails a node that mutates the state it was given and keeps the state intact', async () => {
    const smuggler: Node = {
      name: 'smuggler',
      run: async (state) => {
        const log: unknown = state.log;
        if (Array.isArray(log)) log.push('smuggled');
        return { b: true };
      },
    };
    const result = await new WorkflowEngine(linear([nodeA, smuggler]), { greeting: '' }, new MetricsRecorder()).run({});

    expect(result.status).toBe('failed');
    expect(result.error?.code).toBe('NODE_EXECUTION');
    expect(result.error?.node).toBe('smuggler');
    expect(result.state.log).toEqual(['a']);
    expect(result.state.b).toBe(false);
  });

  it('saves a checkpoint after every node', async () => {
    const saves: Array<{ graphId: string; nodeId: string; state: unknown; runId?: string }> = [];
    const checkpointer: Checkpointer = {
      save: async (graphId, nodeId, state, runId) => {
        saves.push({ graphId, nodeId, state, runId });
      },
    };
    const engine = new WorkflowEngine(linear([nodeA, nodeB]), { greeting: 'hi' }, new MetricsRecorder());
    await engine.run({}, undefined, { runId: 'run-7', checkpointer });

    expect(saves.map((save) => [save.graphId, save.nodeId, save.runId])).toEqual([
      ['linear', 'a', 'run-7'],
      ['linear', 'b', 'run-7'],
    ]);
    expect(saves[0].state).toMatchObject({ a: true, b: false });
    expect(saves[1].state).toMatchObject({ a: true, b: true });
  });

  it('keeps running when a checkpoint or progress sink fails', async () => {
    const metrics = new MetricsRecorder();
    const checkpointer: Checkpointer = {
      save: async () => {
        throw new Error('database unavailable');
      },
    };
    const engine = new WorkflowEngine(linear([nodeA, nodeB]), { greeting: 'hi' }, metrics);
    const result = await engine.run(
      {},
      () => {
        throw new Error('sink closed');
      },
      { checkpointer },
    );

    expect(result.status).toBe('completed');
    expect(result.progress).toHaveLength(2);
    expect(metrics.get('workflow.checkpoint.failed', { graph: 'linear' })).toBe(2);
    expect(metrics.get('workflow.run.completed', { graph: 'linear' })).toBe(1);
  });

  it('tracks status through the run lifecycle', async () => {
    const statuses: string[] = [];
    const engine = new WorkflowEngine(linear([nodeA]), { greeting: '' }, new MetricsRecorder());
    const run = engine.createRun({}, () => {
      statuses.push(`${run.status}:${run.currentNode}`);
    });

    expect(run.status).toBe('not_started');
    await run.start();
    expect(statuses).toEqual(['running:a']);
    expect(run.status).toBe('completed');
    expect(run.currentNode).toBeUndefined();
    await expect(run.start()).rejects.toThrow(`Run ${run.runId} was already started`);
  });
});
