export type Priority = 'critical' | 'high' | 'medium' | 'low';

export type SubReport = Record<string, unknown>;

/**
 * Where to pull recommendations from: `subReports[report][section][listKey]`.
 */
export interface SectionRule {
  report: string;
  section: string;
  listKey?: string;
  cap: number;
  priority: Priority;
  source: string;
}

export interface AggregatorConfig {
  /** Per sub-report weight; must sum to 1.0. */
  weights: Record<string, number>;
  /** Applied in order; the order is the precedence of the final list. */
  sections: SectionRule[];
  maxRecommendations?: number;
}

export interface Recommendation {
  source: string;
  priority: Priority;
  recommendation: string;
}

export interface ReportMetadata {
  platform: string;
  creativeType: string;
  model: string;
  extra: Record<string, unknown>;
}

export interface AggregateReport {
  overallScore: number;
  agentScores: Record<string, number>;
  topRecommendations: Recommendation[];
  detailedFindings: Record<string, SubReport>;
  agentErrors: Record<string, string>;
  metadata: ReportMetadata;
  generatedAt: string;
  /** Null for a clean report; the failure message for a degraded one. */
  error: string | null;
}
