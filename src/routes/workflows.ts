import express, { NextFunction, Request, Response, Router } from 'express';
import { ZodError } from 'zod';
import { AppError, validationError } from '../middleware/errorHandler';
import { RunManager, RunRecord, UnknownWorkflowError } from '../services/runManager';
import { WorkflowRegistry } from '../services/workflowRegistry';
import { UnknownFieldError } from '../services/workflow/errors';

function presentRun(record: RunRecord) {
  const finished = record.status !== 'running' && record.status !== 'not_started';
  return {
    runId: record.runId,
    workflow: record.workflow,
    status: record.status,
    createdAt: record.createdAt,
    finishedAt: record.finishedAt,
    progress: record.progress,
    ...(finished && {
      result: {
        output: record.output ?? null,
        error: record.error,
        steps: record.steps,
        trace: record.trace,
      },
    }),
  };
}

export function createWorkflowRouter(registry: WorkflowRegistry, runs: RunManager): Router {
  const router = Router();
  router.use(express.json({ limit: '1mb' }));

  router.get('/workflows', (_req: Request, res: Response) => {
    res.json({ workflows: registry.list() });
  });

  router.post('/workflows/:name/runs', (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = runs.start(req.params.name, req.body ?? {});
      res.status(202).json({ runId: record.runId, status: record.status });
    } catch (error) {
      if (error instanceof UnknownWorkflowError) {
        return next(new AppError(error.message, 404));
      }
      if (error instanceof ZodError) {
        return next(validationError(error));
      }
      if (error instanceof UnknownFieldError) {
        return next(new AppError(error.message, 400));
      }
      return next(error);
    }
  });

  router.get('/runs', (_req: Request, res: Response) => {
    res.json({ runs: runs.list().map((record) => ({
      runId: record.runId,
      workflow: record.workflow,
      status: record.status,
      createdAt: record.createdAt,
    })) });
  });

  router.get('/runs/:runId', (req: Request, res: Response, next: NextFunction) => {
    const record = runs.get(req.params.runId);
    if (!record) {
      return next(new AppError(`Run not found: ${req.params.runId}`, 404));
    }
    return res.json(presentRun(record));
  });

  router.post('/runs/:runId/cancel', (req: Request, res: Response, next: NextFunction) => {
    const outcome = runs.cancel(req.params.runId);
    if (outcome === 'not_found') {
      return next(new AppError(`Run not found: ${req.params.runId}`, 404));
    }
    if (outcome === 'already_finished') {
      return next(new AppError(`Run already finished: ${req.params.runId}`, 409));
    }
    return res.status(202).json({ runId: req.params.runId, status: 'cancelling' });
  });

  return router;
}
