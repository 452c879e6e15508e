// Load environment variables FIRST - before any other imports
import * as dotenv from 'dotenv';
import * as path from 'path';

// In production, __dirname will be 'dist/', so '../.env' resolves to project root
dotenv.config({ path: path.resolve(__dirname, '../.env') });

import { createServer } from 'http';
import { Pool } from 'pg';
import { createApp } from './app';
import { loadConfig } from './config/appConfig';
import { handleUncaughtException, handleUnhandledRejection } from './middleware/errorHandler';
import { PROGRESS_PATH, attachProgressSocket } from './realtime/progressSocket';
import { initSentry } from './sentry';
import { InMemoryDocumentStore } from './services/collaborators/documentStore';
import { OpenAILlmClient } from './services/collaborators/openaiLlmClient';
import { TavilySearchClient } from './services/collaborators/tavilySearchClient';
import { RunManager } from './services/runManager';
import { WorkflowRegistry } from './services/workflowRegistry';
import { CheckpointAdapter } from './services/workflow/checkpointAdapter';
import { buildDesignAnalysisWorkflow, toDesignAnalysisState } from './services/workflow/flows/designAnalysisGraph';
import { buildResearchWorkflow, toResearchState } from './services/workflow/flows/researchGraph';
import logger from './utils/logger';
import { ProgressBus } from './utils/progressBus';

const DESIGN_PATTERNS_FILE = path.resolve(__dirname, '../data/design-patterns.json');

async function main(): Promise<void> {
  const config = loadConfig();
  initSentry(config.sentryDsn);
  handleUncaughtException();
  handleUnhandledRejection();

  logger.info('Starting agent workflow engine', { environment: config.environment });

  const llm = OpenAILlmClient.fromEnv({
    apiKey: config.openai.apiKey,
    baseUrl: config.openai.baseUrl,
    model: config.openai.model,
    maxRetries: config.openai.maxRetries,
  });
  const search = new TavilySearchClient({ apiKey: config.tavily.apiKey, baseUrl: config.tavily.baseUrl });
  const documents = await InMemoryDocumentStore.fromFile(DESIGN_PATTERNS_FILE);
  logger.info('Reference patterns loaded', { documents: documents.size });

  let pool: Pool | undefined;
  let checkpointer: CheckpointAdapter | undefined;
  if (config.databaseUrl) {
    pool = new Pool({ connectionString: config.databaseUrl });
    checkpointer = new CheckpointAdapter(pool);
    await checkpointer.ensureSchema();
    logger.info('Checkpoint store ready');
  } else {
    logger.warn('DATABASE_URL not set; workflow checkpoints are disabled');
  }

  const policies = {
    maxSteps: config.workflow.maxSteps,
    stepTimeoutMs: config.workflow.stepTimeoutMs,
  };
  const registry = new WorkflowRegistry()
    .register({
      description: 'Five-agent review of a marketing creative, aggregated into one scored report',
      engine: buildDesignAnalysisWorkflow({ llm, documents }, policies),
      toState: toDesignAnalysisState,
    })
    .register({
      description: 'Plan, search, analyse and write a cited research report with a review loop',
      engine: buildResearchWorkflow({ llm, search }, { stepTimeoutMs: policies.stepTimeoutMs }),
      toState: toResearchState,
    });

  const bus = new ProgressBus();
  const runs = new RunManager(registry, bus, {
    historyLimit: config.workflow.runHistoryLimit,
    checkpointer,
  });

  const app = createApp({
    registry,
    runs,
    health: {
      database: pool,
      llmConfigured: Boolean(config.openai.apiKey),
      searchConfigured: Boolean(config.tavily.apiKey),
      documentCount: () => documents.size,
      environment: config.environment,
    },
  });

  const server = createServer(app);
  const wss = attachProgressSocket(server, bus);

  server.listen(config.port, () => {
    logger.info(`Workflow service listening on port ${config.port}`, {
      progressSocket: PROGRESS_PATH,
      workflows: registry.list().map((workflow) => workflow.name),
    });
  });

  const shutdown = async (signal: string) => {
    logger.info('Shutting down', { signal });
    await runs.shutdown();
    wss.close();
    server.close();
    await pool?.end();
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        });
    });
  }
}

main().catch((error: unknown) => {
  logger.error('Failed to start workflow service', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
