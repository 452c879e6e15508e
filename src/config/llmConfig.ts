/**
 * LLM temperature modes shared by every node that calls a model.
 */

export interface LLMConfig {
  temperature: number;
  maxTokens: number;
}

export type LLMMode = 'deterministic' | 'reasoning' | 'creative';

export const LLM_CONFIG: Record<LLMMode, LLMConfig> = {
  /**
   * Deterministic mode: temperature 0.0
   * Use for: structured JSON sub-reports, plans, judge verdicts
   */
  deterministic: {
    temperature: 0,
    maxTokens: 2000,
  },

  /**
   * Reasoning mode: temperature 0.3
   * Use for: analysis, contradiction checks, revisions
   */
  reasoning: {
    temperature: 0.3,
    maxTokens: 2000,
  },

  /**
   * Creative mode: temperature 0.7
   * Use for: report drafting
   */
  creative: {
    temperature: 0.7,
    maxTokens: 3000,
  },
};

export function getLLMConfig(mode: LLMMode): LLMConfig {
  return LLM_CONFIG[mode];
}
