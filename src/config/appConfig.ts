import { DEFAULT_POLICIES } from '../services/workflow/policies';

/**
 * Service configuration, read from the environment (.env is loaded by the
 * entry point before anything else).
 */

export interface AppConfig {
  port: number;
  environment: string;
  openai: {
    apiKey?: string;
    baseUrl?: string;
    model: string;
    maxRetries: number;
  };
  tavily: {
    apiKey?: string;
    baseUrl: string;
  };
  workflow: {
    maxSteps: number;
    stepTimeoutMs: number;
    runHistoryLimit: number;
  };
  databaseUrl?: string;
  sentryDsn?: string;
}

function numberFrom(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Expected a number but got "${value}"`);
  }
  return parsed;
}

function optional(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: numberFrom(env.PORT, 3000),
    environment: env.NODE_ENV || 'development',
    openai: {
      apiKey: optional(env.OPENAI_API_KEY),
      baseUrl: optional(env.OPENAI_BASE_URL),
      model: env.OPENAI_MODEL || 'gpt-4o-mini',
      maxRetries: numberFrom(env.LLM_MAX_RETRIES, 2),
    },
    tavily: {
      apiKey: optional(env.TAVILY_API_KEY),
      baseUrl: env.TAVILY_API_BASE || 'https://api.tavily.com',
    },
    workflow: {
      maxSteps: numberFrom(env.WORKFLOW_MAX_STEPS, DEFAULT_POLICIES.maxSteps),
      stepTimeoutMs: numberFrom(env.WORKFLOW_STEP_TIMEOUT_MS, DEFAULT_POLICIES.stepTimeoutMs),
      runHistoryLimit: numberFrom(env.RUN_HISTORY_LIMIT, 100),
    },
    databaseUrl: optional(env.DATABASE_URL),
    sentryDsn: optional(env.SENTRY_DSN),
  };
}
