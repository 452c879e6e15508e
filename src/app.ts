import express, { Application } from 'express';
import { HealthDependencies, createHealthRouter } from './health';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createWorkflowRouter } from './routes/workflows';
import { RunManager } from './services/runManager';
import { WorkflowRegistry } from './services/workflowRegistry';

export interface AppDependencies {
  registry: WorkflowRegistry;
  runs: RunManager;
  health: HealthDependencies;
}

export function createApp(deps: AppDependencies): Application {
  const app = express();
  app.disable('x-powered-by');

  app.use(createHealthRouter(deps.health));
  app.use('/api', createWorkflowRouter(deps.registry, deps.runs));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
