/**
 * Health Check Module
 * Provides health check endpoints for monitoring and deployment verification
 */

import { Request, Response, Router } from 'express';
import os from 'os';
import { SqlClient } from './services/workflow/checkpointAdapter';
import logger from './utils/logger';

type CheckResult = {
  status: 'pass' | 'fail';
  message?: string;
};

interface HealthCheck {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  version: string;
  environment: string;
  system: {
    platform: string;
    nodeVersion: string;
    memory: {
      total: number;
      free: number;
      used: number;
      usagePercent: number;
    };
    cpu: {
      cores: number;
      loadAverage: number[];
    };
  };
  checks: Record<string, CheckResult>;
}

export interface HealthDependencies {
  /** Checkpoint database; omitted when checkpoints are disabled. */
  database?: SqlClient;
  llmConfigured: boolean;
  searchConfigured: boolean;
  documentCount: () => number;
  version?: string;
  environment?: string;
  timeoutMs?: number;
}

/** Checks that decide readiness. The rest only degrade `/health`. */
export const CRITICAL_CHECKS = ['uptime', 'database', 'documents'];

/**
 * Check external service health with timeout
 */
async function checkWithTimeout(
  serviceName: string,
  checkFn: () => Promise<CheckResult>,
  timeoutMs: number,
): Promise<CheckResult> {
  let timer: NodeJS.Timeout | undefined;
  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error('Timeout')), timeoutMs);
    });
    return await Promise.race([checkFn(), timeoutPromise]);
  } catch (error) {
    return {
      status: 'fail',
      message: `${serviceName} unreachable: ${error instanceof Error ? error.message : 'Unknown error'}`,
    };
  } finally {
    clearTimeout(timer);
  }
}

function configured(name: string, isSet: boolean, variable: string): CheckResult {
  return isSet
    ? { status: 'pass', message: `${name} is configured` }
    : { status: 'fail', message: `${variable} is not set` };
}

/**
 * Perform health checks
 */
export async function performHealthChecks(deps: HealthDependencies): Promise<Record<string, CheckResult>> {
  const checks: Record<string, CheckResult> = {};

  const totalMem = os.totalmem();
  const memUsagePercent = ((totalMem - os.freemem()) / totalMem) * 100;
  checks.memory = {
    status: memUsagePercent < 90 ? 'pass' : 'fail',
    message:
      memUsagePercent < 90
        ? 'Memory usage within acceptable range'
        : 'Memory usage critical',
  };

  const uptime = process.uptime();
  checks.uptime = {
    status: uptime > 0 ? 'pass' : 'fail',
    message: `Process has been running for ${Math.floor(uptime)} seconds`,
  };

  const database = deps.database;
  checks.database = database
    ? await checkWithTimeout(
        'Database',
        async () => {
          await database.query('SELECT 1');
          return { status: 'pass', message: 'Database connected' };
        },
        deps.timeoutMs ?? 5000,
      )
    : { status: 'pass', message: 'Checkpoints disabled' };

  const documents = deps.documentCount();
  checks.documents = {
    status: documents > 0 ? 'pass' : 'fail',
    message: `${documents} reference documents loaded`,
  };

  checks.openai = configured('OpenAI', deps.llmConfigured, 'OPENAI_API_KEY');
  checks.tavily = configured('Tavily', deps.searchConfigured, 'TAVILY_API_KEY');

  return checks;
}

function criticalPassed(checks: Record<string, CheckResult>): boolean {
  return CRITICAL_CHECKS.every((key) => checks[key]?.status === 'pass');
}

/**
 * Create health check router
 */
export function createHealthRouter(deps: HealthDependencies): Router {
  const router = Router();

  router.get('/health', async (_req: Request, res: Response) => {
    const totalMem = os.totalmem();
    const freeMem = os.freemem();
    const usedMem = totalMem - freeMem;

    try {
      const checks = await performHealthChecks(deps);
      const allChecksPassed = Object.values(checks).every((check) => check.status === 'pass');
      const ready = criticalPassed(checks);

      const healthData: HealthCheck = {
        status: allChecksPassed ? 'healthy' : ready ? 'degraded' : 'unhealthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        version: deps.version || process.env.npm_package_version || '0.0.0',
        environment: deps.environment || process.env.NODE_ENV || 'development',
        system: {
          platform: os.platform(),
          nodeVersion: process.version,
          memory: {
            total: totalMem,
            free: freeMem,
            used: usedMem,
            usagePercent: (usedMem / totalMem) * 100,
          },
          cpu: {
            cores: os.cpus().length,
            loadAverage: os.loadavg(),
          },
        },
        checks,
      };

      res.status(ready ? 200 : 503).json(healthData);
    } catch (error) {
      logger.error('Health check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(503).json({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: 'Health check execution failed',
      });
    }
  });

  /**
   * Liveness probe - minimal check to verify process is running
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * Readiness probe - check if service is ready to accept traffic
   */
  router.get('/health/ready', async (_req: Request, res: Response) => {
    try {
      const checks = await performHealthChecks(deps);
      res.status(criticalPassed(checks) ? 200 : 503).json({
        status: criticalPassed(checks) ? 'ready' : 'not_ready',
        timestamp: new Date().toISOString(),
        checks,
      });
    } catch (error) {
      logger.error('Readiness check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(503).json({
        status: 'not_ready',
        timestamp: new Date().toISOString(),
        error: 'Readiness check execution failed',
      });
    }
  });

  return router;
}
