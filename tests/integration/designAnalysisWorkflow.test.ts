import { ZodError } from 'zod';
import {
  buildDesignAnalysisWorkflow,
  toDesignAnalysisState,
} from '../../src/services/workflow/flows/designAnalysisGraph';
import { runWorkflow } from '../../src/services/workflow/runWorkflow';
import { DocumentStore, LlmClient, LlmRequest, RetrievedDocument } from '../../src/services/collaborators/types';
import { MetricsRecorder } from '../../src/utils/metrics';

type Reply = Record<string, unknown> | Error;

const ROLES: Record<string, string> = {
  visual: 'a senior visual designer',
  ux: 'a UX researcher',
  market: 'a social media strategist',
  conversion: 'a conversion rate specialist',
  brand: 'a brand guardian',
};

/** Answers each agent by the role named in its system prompt. */
function scriptedLlm(replies: Record<string, Reply>) {
  const requests: LlmRequest[] = [];
  const llm: LlmClient = {
    complete: async (request) => {
      requests.push(request);
      const agent = Object.keys(ROLES).find((name) => request.system?.includes(ROLES[name]));
      const reply = agent ? replies[agent] : undefined;
      if (reply === undefined) throw new Error(`No scripted reply for ${request.system}`);
      if (reply instanceof Error) throw reply;
      return { text: JSON.stringify(reply), model: 'fake-model' };
    },
  };
  return { llm, requests };
}

const pattern: RetrievedDocument = {
  id: 'p1',
  title: 'High-contrast call to action',
  content: 'Buttons need contrast.',
  tags: ['cta'],
  similarity: 1,
};

function fixedStore(): DocumentStore {
  return { retrieve: jest.fn(async () => [pattern]) };
}

const cleanReplies: Record<string, Reply> = {
  visual: {
    overall_score: 8,
    color_analysis: { recommendations: ['Warm the palette', 'Drop the gradient', 'Brighten CTA', 'Unused'] },
  },
  ux: { overall_score: 6, accessibility: { recommendations: ['Raise text contrast'] } },
  market: { overall_score: 7 },
  conversion: { overall_score: 9 },
  brand: { overall_score: 5 },
};

const input = { description: 'Summer sale banner with a yellow button', platform: 'Instagram', creativeType: 'Ad', topK: 1 };

describe('design analysis workflow', () => {
  it('runs every agent and aggregates a weighted report', async () => {
    const { llm, requests } = scriptedLlm(cleanReplies);
    const labels: string[] = [];
    const workflow = buildDesignAnalysisWorkflow({ llm, documents: fixedStore() }, {}, new MetricsRecorder());

    const result = await runWorkflow(toDesignAnalysisState(input), workflow, (event) => {
      labels.push(event.label);
    });

    expect(result.status).toBe('completed');
    expect(result.steps).toBe(6);
    expect(labels).toEqual([
      'Visual Analysis',
      'UX Critique',
      'Market Research',
      'Conversion Review',
      'Brand Review',
      'Aggregating Results',
    ]);
    expect(requests).toHaveLength(5);
    expect(requests[0].mode).toBe('deterministic');
    expect(requests[0].json).toBe(true);
    expect(requests[0].prompt).toContain('- High-contrast call to action: Buttons need contrast.');

    const report = result.output;
    expect(report?.overallScore).toBe(7);
    expect(report?.agentScores).toEqual({ visual: 8, ux: 6, market: 7, conversion: 9, brand: 5 });
    expect(report?.topRecommendations).toEqual([
      { source: 'Visual - Color', priority: 'high', recommendation: 'Warm the palette' },
      { source: 'Visual - Color', priority: 'high', recommendation: 'Drop the gradient' },
      { source: 'Visual - Color', priority: 'high', recommendation: 'Brighten CTA' },
      { source: 'UX - Accessibility', priority: 'critical', recommendation: 'Raise text contrast' },
    ]);
    expect(report?.agentErrors).toEqual({});
    expect(report?.metadata).toEqual({
      platform: 'Instagram',
      creativeType: 'Ad',
      model: 'fake-model',
      extra: {},
    });
    expect(report?.error).toBeNull();
    expect(result.state.references.brand).toEqual(['High-contrast call to action']);
    expect(result.state.logs).toEqual([
      'Visual Analysis: score 8',
      'UX Critique: score 6',
      'Market Research: score 7',
      'Conversion Review: score 9',
      'Brand Review: score 5',
    ]);
  });

  it('skips agents that were not selected', async () => {
    const { llm, requests } = scriptedLlm(cleanReplies);
    const workflow = buildDesignAnalysisWorkflow({ llm, documents: fixedStore() }, {}, new MetricsRecorder());

    const result = await runWorkflow(
      toDesignAnalysisState({ ...input, enabledAgents: ['visual', 'brand'] }),
      workflow,
    );

    expect(requests).toHaveLength(2);
    expect(result.steps).toBe(6);
    expect(result.state.ux).toEqual({ error: 'skipped_by_user' });
    expect(result.output?.agentErrors).toEqual({
      ux: 'skipped_by_user',
      market: 'skipped_by_user',
      conversion: 'skipped_by_user',
    });
    expect(result.output?.overallScore).toBe(2.6);
    expect(result.output?.agentScores.ux).toBe(0);
    expect(result.output?.metadata.extra).toEqual({ enabledAgents: ['visual', 'brand'] });
    expect(result.state.logs).toContain('UX Critique: skipped_by_user');
  });

  it('records a failing agent and keeps going', async () => {
    const { llm } = scriptedLlm({ ...cleanReplies, ux: new Error('rate limited') });
    const workflow = buildDesignAnalysisWorkflow({ llm, documents: fixedStore() }, {}, new MetricsRecorder());

    const result = await runWorkflow(toDesignAnalysisState(input), workflow);

    expect(result.status).toBe('completed');
    expect(result.output?.agentErrors).toEqual({ ux: 'rate limited' });
    expect(result.output?.agentScores.ux).toBe(0);
    expect(result.output?.overallScore).toBe(5.8);
    expect(result.state.logs[1]).toBe('UX Critique: failed (rate limited)');
  });

  it('returns a degraded report when retrieval fails mid-run', async () => {
    const { llm } = scriptedLlm(cleanReplies);
    const documents: DocumentStore = {
      retrieve: async (query) => {
        if (query.startsWith('fit with the target platform')) throw new Error('index offline');
        return [pattern];
      },
    };
    const workflow = buildDesignAnalysisWorkflow({ llm, documents }, {}, new MetricsRecorder());

    const result = await runWorkflow(toDesignAnalysisState(input), workflow);

    expect(result.status).toBe('failed');
    expect(result.error).toEqual({
      code: 'NODE_EXECUTION',
      message: 'Node market_agent failed: index offline',
      node: 'market_agent',
    });
    expect(result.output?.error).toBe('Node market_agent failed: index offline');
    expect(result.output?.overallScore).toBe(0);
    expect(result.output?.topRecommendations).toEqual([]);
    expect(result.output?.detailedFindings.visual).toEqual(cleanReplies.visual);
    expect(result.output?.detailedFindings.market).toEqual({});
  });

  it('does not retrieve references when topK is 0', async () => {
    const { llm } = scriptedLlm(cleanReplies);
    const documents = fixedStore();
    const workflow = buildDesignAnalysisWorkflow({ llm, documents }, {}, new MetricsRecorder());

    const result = await runWorkflow(toDesignAnalysisState({ ...input, topK: 0 }), workflow);

    expect(documents.retrieve).not.toHaveBeenCalled();
    expect(result.state.references.visual).toEqual([]);
  });

  it('validates request input', () => {
    expect(() => toDesignAnalysisState({ description: '' })).toThrow(ZodError);
    expect(() => toDesignAnalysisState({ description: 'x', enabledAgents: ['legal'] })).toThrow(ZodError);
    expect(toDesignAnalysisState({ description: 'Poster' })).toEqual({
      description: 'Poster',
      imageUrl: null,
      platform: 'Unknown',
      creativeType: 'General',
      brandGuidelines: null,
      enabledAgents: [],
      topK: 3,
    });
  });
});
