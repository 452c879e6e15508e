import { z } from 'zod';
import logger from '../../../utils/logger';
import { MetricsRecorder } from '../../../utils/metrics';
import { parseJsonObject, stringList } from '../../collaborators/jsonResponse';
import { LlmClient, SearchClient, SearchResult } from '../../collaborators/types';
import { WorkflowEngine } from '../engine';
import { WorkflowGraph } from '../graph';
import { GraphPolicies } from '../policies';
import { concat, sum, union, upsertBy } from '../reducers';
import { defineState } from '../stateSchema';
import { isRecord } from '../../aggregation/reportAggregator';
import { END } from '../types';

export const RESEARCH_WORKFLOW = 'deep-research';

export const RESEARCH_DEPTHS = ['fast', 'balanced', 'deep'] as const;
export type ResearchDepth = (typeof RESEARCH_DEPTHS)[number];

export const RESEARCH_OBJECTIVES = ['learn', 'compare', 'decide', 'forecast', 'validate'] as const;
export type ResearchObjective = (typeof RESEARCH_OBJECTIVES)[number];

/** Judge scores below this send the draft back for revision. */
export const APPROVAL_SCORE = 7;
export const RESEARCH_MAX_STEPS = 20;

const SOURCES_PER_QUERY: Record<ResearchDepth, number> = {
  fast: 3,
  balanced: 5,
  deep: 8,
};

const OBJECTIVE_STRATEGY: Record<ResearchObjective, string> = {
  learn: 'Focus on foundational concepts, history and key definitions.',
  compare: 'Compare the distinct options, their pros and cons and their features.',
  decide: 'Focus on decision criteria, weighting factors and a final recommendation.',
  forecast: 'Focus on trends, predictions and growth factors.',
  validate: 'Focus on fact-checking the claim in the question.',
};

/** A search result with the credibility the fact checker gave it (0-100). */
export interface ResearchSource extends SearchResult {
  credibilityScore?: number;
  credibilityReason?: string;
}

export interface ResearchLog {
  agent: string;
  message: string;
  timestamp: string;
}

export interface ResearchState {
  question: string;
  depth: ResearchDepth;
  objective: ResearchObjective;
  domain: string;
  maxReviews: number;
  plan: string[];
  sources: ResearchSource[];
  findings: string[];
  contradictions: string[];
  draft: string;
  feedback: string | null;
  scorecard: Record<string, unknown>;
  reviewCount: number;
  report: string | null;
  logs: ResearchLog[];
  warnings: string[];
  error: string | null;
}

export interface ResearchReport {
  question: string;
  report: string;
  findings: string[];
  contradictions: string[];
  sources: ResearchSource[];
  scorecard: Record<string, unknown>;
  reviewCount: number;
  warnings: string[];
  error: string | null;
}

export interface ResearchCollaborators {
  llm: LlmClient;
  search: SearchClient;
}

export const researchInputSchema = z.object({
  question: z.string().trim().min(3),
  depth: z.enum(RESEARCH_DEPTHS).default('balanced'),
  objective: z.enum(RESEARCH_OBJECTIVES).default('learn'),
  domain: z.string().min(1).default('General'),
  maxReviews: z.number().int().min(0).max(5).default(2),
});

/** Validates raw input; throws a ZodError when it does not match. */
export function toResearchState(input: unknown): Partial<ResearchState> {
  return researchInputSchema.parse(input);
}

export const researchState = defineState<ResearchState>(
  () => ({
    question: '',
    depth: 'balanced',
    objective: 'learn',
    domain: 'General',
    maxReviews: 2,
    plan: [],
    sources: [],
    findings: [],
    contradictions: [],
    draft: '',
    feedback: null,
    scorecard: {},
    reviewCount: 0,
    report: null,
    logs: [],
    warnings: [],
    error: null,
  }),
  {
    sources: upsertBy<ResearchSource>((source) => source.url),
    findings: concat<string>(),
    logs: concat<ResearchLog>(),
    warnings: union<string>(),
    reviewCount: sum(),
  },
);

function log(agent: string, message: string): ResearchLog[] {
  return [{ agent, message, timestamp: new Date().toISOString() }];
}

function fallbackPlan(question: string): string[] {
  return [`${question} overview`, `${question} statistics`, `${question} challenges`];
}

function listSources(sources: readonly ResearchSource[]): string {
  return sources
    .map((source) => {
      const credibility = source.credibilityScore !== undefined ? ` (credibility ${source.credibilityScore})` : '';
      return `[${source.id}] ${source.title}${credibility}: ${source.snippet}`;
    })
    .join('\n');
}

/** Best-scored first; unscored sources keep their order after the scored ones. */
export function rankByCredibility(sources: readonly ResearchSource[]): ResearchSource[] {
  const rank = (source: ResearchSource) => source.credibilityScore ?? -1;
  return [...sources].sort((a, b) => rank(b) - rank(a));
}

/**
 * Reads `{"scores": [{"id", "score", "reason"}]}` and returns a scored copy
 * of every source the reply names. Scores are clamped to 0-100.
 */
export function applyCredibility(
  sources: readonly ResearchSource[],
  reply: Record<string, unknown>,
): ResearchSource[] {
  if (!Array.isArray(reply.scores)) {
    throw new Error('Credibility reply has no "scores" list');
  }
  const byId = new Map(sources.map((source) => [source.id, source]));
  const scored = new Map<string, ResearchSource>();
  for (const entry of reply.scores) {
    if (!isRecord(entry) || typeof entry.id !== 'string' || typeof entry.score !== 'number') continue;
    const source = byId.get(entry.id);
    if (!source) continue;
    scored.set(source.id, {
      ...source,
      credibilityScore: Math.min(100, Math.max(0, Math.round(entry.score))),
      credibilityReason: typeof entry.reason === 'string' ? entry.reason : undefined,
    });
  }
  return [...scored.values()];
}

function withReferences(draft: string, sources: readonly ResearchSource[]): string {
  if (sources.length === 0) return draft;
  const references = sources.map((source, index) => `${index + 1}. [${source.title}](${source.url})`);
  return [draft.trimEnd(), '', '## Sources', ...references].join('\n');
}

export function buildResearchGraph(policies: Partial<GraphPolicies> = {}) {
  const graph = new WorkflowGraph<ResearchState, ResearchCollaborators>(RESEARCH_WORKFLOW, researchState);

  graph.addNode({
    name: 'planner',
    label: 'Planning Research',
    reads: ['question', 'objective', 'domain'],
    writes: ['plan', 'logs', 'warnings'],
    run: async (state, { collaborators, signal }) => {
      const response = await collaborators.llm.complete(
        {
          system: 'You are a research planner. Answer with JSON only.',
          prompt: [
            `Decompose this research question into 3 distinct search queries: "${state.question}"`,
            `Domain: ${state.domain}`,
            `Objective: ${state.objective}. ${OBJECTIVE_STRATEGY[state.objective]}`,
            'Reply with {"queries": string[]}.',
          ].join('\n'),
          mode: 'reasoning',
          json: true,
        },
        signal,
      );
      try {
        const queries = stringList(parseJsonObject(response.text).queries);
        if (queries.length > 0) {
          return { plan: queries, logs: log('planner', `Planned ${queries.length} queries`) };
        }
      } catch (error) {
        logger.debug('Planner reply was not JSON', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return {
        plan: fallbackPlan(state.question),
        logs: log('planner', 'Using fallback plan'),
        warnings: ['Planner reply could not be parsed; used a fallback plan'],
      };
    },
  });

  graph.addNode({
    name: 'retriever',
    label: 'Searching Sources',
    reads: ['plan', 'depth', 'sources'],
    writes: ['sources', 'logs', 'warnings'],
    run: async (state, { collaborators, signal }) => {
      const limit = SOURCES_PER_QUERY[state.depth];
      const found: ResearchSource[] = [];
      const warnings: string[] = [];
      const seen = new Set(state.sources.map((source) => source.url));

      for (const query of state.plan) {
        try {
          const results = await collaborators.search.search(query, { limit, signal });
          for (const result of results) {
            if (seen.has(result.url)) continue;
            seen.add(result.url);
            found.push({ ...result, id: `src-${state.sources.length + found.length + 1}` });
          }
        } catch (error) {
          if (signal.aborted) throw error;
          warnings.push(`Search failed for "${query}"`);
        }
      }
      if (found.length === 0) {
        warnings.push('No sources found');
      }
      return {
        sources: found,
        logs: log('retriever', `Collected ${found.length} sources`),
        warnings,
      };
    },
  });

  graph.addNode({
    name: 'credibility',
    label: 'Scoring Credibility',
    reads: ['sources'],
    writes: ['sources', 'logs', 'warnings'],
    run: async (state, { collaborators, signal }) => {
      if (state.sources.length === 0) {
        return { logs: log('credibility', 'No sources to score') };
      }
      let reply: Record<string, unknown>;
      try {
        const response = await collaborators.llm.complete(
          {
            system: 'You are a fact checker. Answer with JSON only.',
            prompt: [
              'Score the credibility of each source from 0 to 100 on authority, recency and relevance.',
              'Sources:',
              listSources(state.sources),
              'Reply with {"scores": [{"id": string, "score": number, "reason": string}]}.',
            ].join('\n'),
            mode: 'deterministic',
            json: true,
          },
          signal,
        );
        reply = parseJsonObject(response.text);
      } catch (error) {
        if (signal.aborted) throw error;
        const message = error instanceof Error ? error.message : String(error);
        logger.warn('Credibility scoring failed', { error: message });
        return {
          logs: log('credibility', `Scoring failed: ${message}`),
          warnings: ['Credibility scoring failed; sources are unranked'],
        };
      }
      try {
        const scored = applyCredibility(state.sources, reply);
        return {
          sources: scored,
          logs: log('credibility', `Scored ${scored.length} of ${state.sources.length} sources`),
        };
      } catch {
        return {
          logs: log('credibility', 'Credibility reply had no scores'),
          warnings: ['Credibility reply could not be parsed; sources are unranked'],
        };
      }
    },
  });

  graph.addNode({
    name: 'analysis',
    label: 'Analysing Sources',
    reads: ['question', 'sources'],
    writes: ['findings', 'logs', 'warnings'],
    run: async (state, { collaborators, signal }) => {
      if (state.sources.length === 0) {
        return { logs: log('analysis', 'No sources to analyse') };
      }
      const response = await collaborators.llm.complete(
        {
          system: 'You are a research analyst. Answer with JSON only.',
          prompt: [
            `Question: ${state.question}`,
            'Sources, most credible first:',
            listSources(rankByCredibility(state.sources)),
            'Extract the key findings, citing source ids in brackets. Prefer the more credible sources.',
            'Reply with {"findings": string[]}.',
          ].join('\n'),
          mode: 'deterministic',
          json: true,
        },
        signal,
      );
      try {
        const findings = stringList(parseJsonObject(response.text).findings);
        return { findings, logs: log('analysis', `Extracted ${findings.length} findings`) };
      } catch {
        return {
          logs: log('analysis', 'Analysis reply was not JSON'),
          warnings: ['Analysis reply could not be parsed'],
        };
      }
    },
  });

  graph.addNode({
    name: 'contradictions',
    label: 'Checking Contradictions',
    reads: ['findings', 'sources'],
    writes: ['contradictions', 'logs', 'warnings'],
    run: async (state, { collaborators, signal }) => {
      const response = await collaborators.llm.complete(
        {
          system: 'You look for conflicting claims. Answer with JSON only.',
          prompt: [
            'Findings:',
            ...state.findings.map((finding) => `- ${finding}`),
            'List claims that contradict each other.',
            'Reply with {"contradictions": string[]}.',
          ].join('\n'),
          mode: 'deterministic',
          json: true,
        },
        signal,
      );
      try {
        const contradictions = stringList(parseJsonObject(response.text).contradictions);
        return {
          contradictions,
          logs: log('contradictions', `Found ${contradictions.length} contradictions`),
        };
      } catch {
        return {
          logs: log('contradictions', 'Contradiction reply was not JSON'),
          warnings: ['Contradiction reply could not be parsed'],
        };
      }
    },
  });

  graph.addNode({
    name: 'writer',
    label: 'Writing Report',
    reads: ['question', 'findings', 'contradictions', 'sources'],
    writes: ['draft', 'logs'],
    run: async (state, { collaborators, signal }) => {
      const prompt = [
        `Write a markdown research report answering: ${state.question}`,
        'Findings:',
        ...state.findings.map((finding) => `- ${finding}`),
      ];
      if (state.contradictions.length > 0) {
        prompt.push('Open contradictions:', ...state.contradictions.map((item) => `- ${item}`));
      }
      prompt.push('Sources:', listSources(state.sources));

      const response = await collaborators.llm.complete(
        { system: 'You are a research writer.', prompt: prompt.join('\n'), mode: 'creative' },
        signal,
      );
      return { draft: response.text, logs: log('writer', 'Drafted report') };
    },
  });

  graph.addNode({
    name: 'judge',
    label: 'Reviewing Draft',
    reads: ['question', 'draft', 'reviewCount', 'maxReviews'],
    writes: ['feedback', 'scorecard', 'reviewCount', 'logs', 'warnings'],
    run: async (state, { collaborators, signal }) => {
      if (state.reviewCount >= state.maxReviews) {
        return {
          feedback: null,
          logs: log('judge', `Review limit (${state.maxReviews}) reached; approving`),
        };
      }

      try {
        const response = await collaborators.llm.complete(
          {
            system: 'You are a strict research judge. Answer with JSON only.',
            prompt: [
              `Question: ${state.question}`,
              'Report:',
              state.draft,
              'Reply with {"overall_score": number (0-10), "required_fixes": string[]}.',
            ].join('\n'),
            mode: 'deterministic',
            json: true,
          },
          signal,
        );
        const scorecard = parseJsonObject(response.text);
        const fixes = stringList(scorecard.required_fixes);
        const score = typeof scorecard.overall_score === 'number' ? scorecard.overall_score : 0;
        const approved = fixes.length === 0 && score >= APPROVAL_SCORE;
        return {
          scorecard,
          feedback: approved ? null : `Critique: ${fixes.join('; ')}`,
          reviewCount: 1,
          logs: log('judge', approved ? `Approved (score ${score})` : `Requested ${fixes.length} fixes (score ${score})`),
        };
      } catch (error) {
        if (signal.aborted) throw error;
        const message = error instanceof Error ? error.message : String(error);
        return {
          scorecard: { error: message },
          feedback: null,
          reviewCount: 1,
          logs: log('judge', `Review failed: ${message}`),
          warnings: ['Draft review failed; report was not reviewed'],
        };
      }
    },
  });

  graph.addNode({
    name: 'revise',
    label: 'Revising Draft',
    reads: ['draft', 'feedback'],
    writes: ['draft', 'logs'],
    run: async (state, { collaborators, signal }) => {
      const response = await collaborators.llm.complete(
        {
          system: 'You are an expert editor.',
          prompt: [
            'Refine this report based on the feedback.',
            `Feedback: ${state.feedback ?? ''}`,
            'Report:',
            state.draft,
            'Return the full updated markdown report.',
          ].join('\n'),
          mode: 'reasoning',
        },
        signal,
      );
      return { draft: response.text, logs: log('revise', 'Applied revisions') };
    },
  });

  graph.addNode({
    name: 'finalize',
    label: 'Finalizing Report',
    reads: ['draft', 'sources'],
    writes: ['report', 'logs'],
    run: async (state) => ({
      report: withReferences(state.draft, state.sources),
      logs: log('finalize', 'Report ready'),
    }),
  });

  graph
    .setEntryPoint('planner')
    .addEdge('planner', 'retriever')
    .addEdge('retriever', 'credibility')
    .addEdge('credibility', 'analysis')
    .addConditionalEdges('analysis', (state) => (state.depth === 'deep' ? 'deep' : 'standard'), {
      deep: 'contradictions',
      standard: 'writer',
    })
    .addEdge('contradictions', 'writer')
    .addEdge('writer', 'judge')
    .addConditionalEdges('judge', (state) => (state.feedback ? 'revise' : 'approve'), {
      revise: 'revise',
      approve: 'finalize',
    })
    .addEdge('revise', 'judge')
    .addEdge('finalize', END);

  return graph.compile<ResearchReport>({
    maxSteps: policies.maxSteps ?? RESEARCH_MAX_STEPS,
    stepTimeoutMs: policies.stepTimeoutMs,
    output: (state) => ({
      question: state.question,
      report: state.report ?? state.draft,
      findings: [...state.findings],
      contradictions: [...state.contradictions],
      sources: [...state.sources],
      scorecard: state.scorecard,
      reviewCount: state.reviewCount,
      warnings: [...state.warnings],
      error: state.error,
    }),
    onFailure: (_state, failure) => ({
      error: failure.message,
      warnings: [`Research stopped early${failure.node ? ` at ${failure.node}` : ''}`],
    }),
  });
}

export function buildResearchWorkflow(
  collaborators: ResearchCollaborators,
  policies: Partial<GraphPolicies> = {},
  metrics?: MetricsRecorder,
): WorkflowEngine<ResearchState, ResearchCollaborators, ResearchReport> {
  return new WorkflowEngine(buildResearchGraph(policies), collaborators, metrics);
}
