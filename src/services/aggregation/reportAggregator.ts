import { AggregatorConfigError } from '../workflow/errors';
import { NodeDefinition, StateView } from '../workflow/types';
import {
  AggregateReport,
  AggregatorConfig,
  Recommendation,
  ReportMetadata,
  SubReport,
} from './types';

export const DEFAULT_MAX_RECOMMENDATIONS = 10;
const WEIGHT_TOLERANCE = 1e-6;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Numbers pass through, numeric strings are parsed, anything else is 0.
 */
export function safeScore(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

export function roundScore(value: number): number {
  return Math.round(value * 10) / 10;
}

export function validateAggregatorConfig(config: AggregatorConfig): void {
  const entries = Object.entries(config.weights);
  if (entries.length === 0) {
    throw new AggregatorConfigError('Aggregator needs at least one weighted sub-report');
  }
  for (const [report, weight] of entries) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new AggregatorConfigError(`Invalid weight for ${report}: ${weight}`, { report, weight });
    }
  }
  const total = entries.reduce((acc, [, weight]) => acc + weight, 0);
  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    throw new AggregatorConfigError(`Weights must sum to 1.0 (got ${total})`, { total });
  }
  for (const rule of config.sections) {
    if (!(rule.report in config.weights)) {
      throw new AggregatorConfigError(`Section ${rule.source} reads undeclared sub-report ${rule.report}`, {
        report: rule.report,
      });
    }
    if (!Number.isInteger(rule.cap) || rule.cap < 0) {
      throw new AggregatorConfigError(`Invalid cap for ${rule.source}: ${rule.cap}`, { cap: rule.cap });
    }
  }
  const max = config.maxRecommendations;
  if (max !== undefined && (!Number.isInteger(max) || max < 0)) {
    throw new AggregatorConfigError(`Invalid maxRecommendations: ${max}`, { maxRecommendations: max });
  }
}

function buildMetadata(metadata: Partial<ReportMetadata>): ReportMetadata {
  return {
    platform: metadata.platform || 'Unknown',
    creativeType: metadata.creativeType || 'General',
    model: metadata.model || 'Unknown',
    extra: metadata.extra || {},
  };
}

/**
 * Folds named sub-reports into one scored report.
 *
 * Recommendations are taken rule by rule, each capped, then the whole list
 * is cut to `maxRecommendations`. The list is never re-sorted by priority:
 * rule order is the precedence.
 */
export class ReportAggregator {
  private readonly config: AggregatorConfig;
  private readonly maxRecommendations: number;

  constructor(config: AggregatorConfig) {
    validateAggregatorConfig(config);
    this.config = config;
    this.maxRecommendations = config.maxRecommendations ?? DEFAULT_MAX_RECOMMENDATIONS;
  }

  reportNames(): string[] {
    return Object.keys(this.config.weights);
  }

  aggregate(
    subReports: Record<string, unknown>,
    metadata: Partial<ReportMetadata> = {},
    now: Date = new Date(),
  ): AggregateReport {
    const agentErrors: Record<string, string> = {};
    const detailedFindings: Record<string, SubReport> = {};
    const agentScores: Record<string, number> = {};
    let overall = 0;

    for (const [name, weight] of Object.entries(this.config.weights)) {
      const report = coerceSubReport(subReports[name]);
      if (report.error) {
        agentErrors[name] = report.error;
      }
      detailedFindings[name] = report.payload;
      const score = safeScore(report.payload.overall_score);
      agentScores[name] = roundScore(score);
      overall += score * weight;
    }

    const candidates: Recommendation[] = [];
    for (const rule of this.config.sections) {
      const section = detailedFindings[rule.report]?.[rule.section];
      if (!isRecord(section)) continue;
      const items = section[rule.listKey || 'recommendations'];
      if (!Array.isArray(items)) continue;
      const picked = items.filter((item): item is string => typeof item === 'string').slice(0, rule.cap);
      for (const recommendation of picked) {
        candidates.push({ source: rule.source, priority: rule.priority, recommendation });
      }
    }

    return {
      overallScore: roundScore(overall),
      agentScores,
      topRecommendations: candidates.slice(0, this.maxRecommendations),
      detailedFindings,
      agentErrors,
      metadata: buildMetadata(metadata),
      generatedAt: now.toISOString(),
      error: null,
    };
  }

  /**
   * Same shape as `aggregate`, with zeroed scores and no recommendations.
   * Whatever sub-reports exist are kept for audit.
   */
  degraded(
    message: string,
    metadata: Partial<ReportMetadata> = {},
    partial: Record<string, unknown> = {},
    now: Date = new Date(),
  ): AggregateReport {
    const agentErrors: Record<string, string> = {};
    const detailedFindings: Record<string, SubReport> = {};
    const agentScores: Record<string, number> = {};
    for (const name of this.reportNames()) {
      const report = coerceSubReport(partial[name]);
      if (report.error) {
        agentErrors[name] = report.error;
      }
      detailedFindings[name] = report.payload;
      agentScores[name] = 0;
    }

    return {
      overallScore: 0,
      agentScores,
      topRecommendations: [],
      detailedFindings,
      agentErrors,
      metadata: buildMetadata(metadata),
      generatedAt: now.toISOString(),
      error: message,
    };
  }
}

function coerceSubReport(value: unknown): { payload: SubReport; error?: string } {
  if (value === undefined || value === null) {
    return { payload: {} };
  }
  if (!isRecord(value)) {
    return {
      payload: { error: 'Invalid agent payload' },
      error: 'Invalid agent payload (non-object)',
    };
  }
  const error = value.error;
  return typeof error === 'string' ? { payload: value, error } : { payload: value };
}

export interface AggregatorNodeOptions<S> {
  name?: string;
  label?: string;
  reads?: ReadonlyArray<keyof S & string>;
  writes?: ReadonlyArray<keyof S & string>;
  /** Sub-reports keyed by the names used in the aggregator weights. */
  collect: (state: StateView<S>) => Record<string, unknown>;
  metadata: (state: StateView<S>) => Partial<ReportMetadata>;
  write: (report: AggregateReport) => Partial<S>;
}

export function createAggregatorNode<S, C>(
  aggregator: ReportAggregator,
  options: AggregatorNodeOptions<S>,
): NodeDefinition<S, C> {
  return {
    name: options.name || 'aggregator',
    label: options.label || 'Aggregating Results',
    reads: options.reads,
    writes: options.writes,
    run: async (state) =>
      options.write(aggregator.aggregate(options.collect(state), options.metadata(state))),
  };
}
