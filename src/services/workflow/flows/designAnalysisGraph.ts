import { z } from 'zod';
import logger from '../../../utils/logger';
import { MetricsRecorder } from '../../../utils/metrics';
import { DESIGN_REVIEW_AGENTS, DESIGN_REVIEW_CONFIG, DesignReviewAgent } from '../../aggregation/presets';
import { ReportAggregator, createAggregatorNode } from '../../aggregation/reportAggregator';
import { AggregateReport, ReportMetadata, SubReport } from '../../aggregation/types';
import { parseJsonObject } from '../../collaborators/jsonResponse';
import { DocumentStore, LlmClient, RetrievedDocument } from '../../collaborators/types';
import { WorkflowEngine } from '../engine';
import { WorkflowGraph } from '../graph';
import { GraphPolicies } from '../policies';
import { SKIPPED_BY_USER, isAgentEnabled, skippable } from '../nodes';
import { concat, mergeRecords } from '../reducers';
import { defineState } from '../stateSchema';
import { END, NodeDefinition, StateView } from '../types';

export const DESIGN_ANALYSIS_WORKFLOW = 'design-analysis';

export interface DesignAnalysisState {
  description: string;
  imageUrl: string | null;
  platform: string;
  creativeType: string;
  brandGuidelines: string | null;
  enabledAgents: string[];
  topK: number;
  model: string | null;
  visual: SubReport | null;
  ux: SubReport | null;
  market: SubReport | null;
  conversion: SubReport | null;
  brand: SubReport | null;
  /** Titles of the reference patterns each agent was shown. */
  references: Record<string, string[]>;
  logs: string[];
  finalReport: AggregateReport | null;
}

export interface DesignAnalysisCollaborators {
  llm: LlmClient;
  documents: DocumentStore;
}

export const designAnalysisInputSchema = z.object({
  description: z.string().min(1),
  imageUrl: z.string().url().optional(),
  platform: z.string().min(1).default('Unknown'),
  creativeType: z.string().min(1).default('General'),
  brandGuidelines: z.string().optional(),
  enabledAgents: z.array(z.enum(DESIGN_REVIEW_AGENTS)).default([]),
  topK: z.number().int().min(0).max(10).default(3),
});

/** Validates raw input; throws a ZodError when it does not match. */
export function toDesignAnalysisState(input: unknown): Partial<DesignAnalysisState> {
  const parsed = designAnalysisInputSchema.parse(input);
  return {
    description: parsed.description,
    imageUrl: parsed.imageUrl ?? null,
    platform: parsed.platform,
    creativeType: parsed.creativeType,
    brandGuidelines: parsed.brandGuidelines ?? null,
    enabledAgents: parsed.enabledAgents,
    topK: parsed.topK,
  };
}

export const designAnalysisState = defineState<DesignAnalysisState>(
  () => ({
    description: '',
    imageUrl: null,
    platform: 'Unknown',
    creativeType: 'General',
    brandGuidelines: null,
    enabledAgents: [],
    topK: 3,
    model: null,
    visual: null,
    ux: null,
    market: null,
    conversion: null,
    brand: null,
    references: {},
    logs: [],
    finalReport: null,
  }),
  {
    references: mergeRecords<string[]>(),
    logs: concat<string>(),
  },
);

interface AgentBrief {
  label: string;
  role: string;
  focus: string;
}

const AGENT_BRIEFS: Record<DesignReviewAgent, AgentBrief> = {
  visual: {
    label: 'Visual Analysis',
    role: 'a senior visual designer',
    focus: 'colour, layout, hierarchy and typography',
  },
  ux: {
    label: 'UX Critique',
    role: 'a UX researcher',
    focus: 'usability, readability and accessibility (contrast, text size, alt text)',
  },
  market: {
    label: 'Market Research',
    role: 'a social media strategist',
    focus: 'fit with the target platform and predicted engagement',
  },
  conversion: {
    label: 'Conversion Review',
    role: 'a conversion rate specialist',
    focus: 'call to action, copy and fit with the funnel stage',
  },
  brand: {
    label: 'Brand Review',
    role: 'a brand guardian',
    focus: 'logo usage, palette, typography and tone against the brand guidelines',
  },
};

function sectionsFor(agent: DesignReviewAgent): string[] {
  const sections = DESIGN_REVIEW_CONFIG.sections.filter((rule) => rule.report === agent);
  return sections.map((rule) => `"${rule.section}": { "${rule.listKey || 'recommendations'}": string[] }`);
}

export function buildAgentPrompt(
  agent: DesignReviewAgent,
  state: StateView<DesignAnalysisState>,
  references: RetrievedDocument[],
): string {
  const lines = [
    `Review this ${state.creativeType} creative for ${state.platform}.`,
    `Focus on ${AGENT_BRIEFS[agent].focus}.`,
    '',
    `Creative: ${state.description}`,
  ];
  if (state.imageUrl) lines.push(`Image: ${state.imageUrl}`);
  if (agent === 'brand' && state.brandGuidelines) {
    lines.push(`Brand guidelines: ${state.brandGuidelines}`);
  }
  if (references.length > 0) {
    lines.push('', 'Reference patterns:');
    for (const doc of references) {
      lines.push(`- ${doc.title}: ${doc.content}`);
    }
  }
  lines.push(
    '',
    'Reply with a JSON object containing "overall_score" (0-10) and:',
    ...sectionsFor(agent).map((section) => `  ${section}`),
  );
  return lines.join('\n');
}

function agentUpdate(
  agent: DesignReviewAgent,
  report: SubReport,
  extra: Partial<DesignAnalysisState>,
): Partial<DesignAnalysisState> {
  const update: Partial<DesignAnalysisState> = { ...extra };
  update[agent] = report;
  return update;
}

/**
 * One review agent: retrieve reference patterns, ask the model for a JSON
 * sub-report. A failing model call is recorded in the sub-report's `error`
 * field so the remaining agents still run.
 */
export function createReviewAgent(
  agent: DesignReviewAgent,
): NodeDefinition<DesignAnalysisState, DesignAnalysisCollaborators> {
  const brief = AGENT_BRIEFS[agent];
  const node: NodeDefinition<DesignAnalysisState, DesignAnalysisCollaborators> = {
    name: `${agent}_agent`,
    label: brief.label,
    reads: ['description', 'imageUrl', 'platform', 'creativeType', 'brandGuidelines', 'topK'],
    writes: [agent, 'references', 'model', 'logs'],
    run: async (state, { collaborators, signal }) => {
      const references = state.topK > 0
        ? await collaborators.documents.retrieve(`${brief.focus} ${state.description}`, state.topK)
        : [];
      const titles = { [agent]: references.map((doc) => doc.title) };

      try {
        const response = await collaborators.llm.complete(
          {
            system: `You are ${brief.role}. Answer with JSON only.`,
            prompt: buildAgentPrompt(agent, state, references),
            mode: 'deterministic',
            json: true,
          },
          signal,
        );
        const report = parseJsonObject(response.text);
        return agentUpdate(agent, report, {
          references: titles,
          model: response.model,
          logs: [`${brief.label}: score ${String(report.overall_score ?? 'n/a')}`],
        });
      } catch (error) {
        if (signal.aborted) throw error;
        const message = error instanceof Error ? error.message : String(error);
        logger.warn('Design review agent failed', { agent, error: message });
        return agentUpdate(agent, { error: message }, {
          references: titles,
          logs: [`${brief.label}: failed (${message})`],
        });
      }
    },
  };

  return skippable(node, {
    isEnabled: (state) => isAgentEnabled(state.enabledAgents, agent),
    onSkip: () =>
      agentUpdate(agent, { error: SKIPPED_BY_USER }, {
        logs: [`${brief.label}: ${SKIPPED_BY_USER}`],
      }),
  });
}

function collectReports(state: StateView<DesignAnalysisState>): Record<string, unknown> {
  const reports: Record<string, unknown> = {};
  for (const agent of DESIGN_REVIEW_AGENTS) {
    if (state[agent] !== null) {
      reports[agent] = state[agent];
    }
  }
  return reports;
}

function metadataOf(state: StateView<DesignAnalysisState>): Partial<ReportMetadata> {
  return {
    platform: state.platform,
    creativeType: state.creativeType,
    model: state.model ?? undefined,
    extra: state.enabledAgents.length > 0 ? { enabledAgents: state.enabledAgents } : {},
  };
}

export function buildDesignAnalysisGraph(
  policies: Partial<GraphPolicies> = {},
  aggregator = new ReportAggregator(DESIGN_REVIEW_CONFIG),
) {
  const graph = new WorkflowGraph<DesignAnalysisState, DesignAnalysisCollaborators>(
    DESIGN_ANALYSIS_WORKFLOW,
    designAnalysisState,
  );

  const agentNodes = DESIGN_REVIEW_AGENTS.map((agent) => createReviewAgent(agent));
  for (const node of agentNodes) {
    graph.addNode(node);
  }
  graph.addNode(
    createAggregatorNode<DesignAnalysisState, DesignAnalysisCollaborators>(aggregator, {
      reads: [...DESIGN_REVIEW_AGENTS, 'platform', 'creativeType', 'model'],
      writes: ['finalReport'],
      collect: collectReports,
      metadata: metadataOf,
      write: (report) => ({ finalReport: report }),
    }),
  );

  graph.setEntryPoint(agentNodes[0].name);
  agentNodes.forEach((node, index) => {
    graph.addEdge(node.name, agentNodes[index + 1]?.name ?? 'aggregator');
  });
  graph.addEdge('aggregator', END);

  return graph.compile<AggregateReport>({
    ...policies,
    output: (state) => state.finalReport ?? undefined,
    onFailure: (state, failure) => ({
      finalReport: aggregator.degraded(failure.message, metadataOf(state), collectReports(state)),
    }),
  });
}

export function buildDesignAnalysisWorkflow(
  collaborators: DesignAnalysisCollaborators,
  policies: Partial<GraphPolicies> = {},
  metrics?: MetricsRecorder,
): WorkflowEngine<DesignAnalysisState, DesignAnalysisCollaborators, AggregateReport> {
  return new WorkflowEngine(buildDesignAnalysisGraph(policies), collaborators, metrics);
}
