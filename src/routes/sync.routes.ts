import { Router, NextFunction, Request, Response } from 'express';
import { logger } from '../core/logger';
import { config } from '../core/config';
import { SyncCycleError, SyncInProgressError } from '../core/errors';
import { StartSyncRequestSchema } from '../core/types';
import { parseRequest } from '../middleware/validate';
import type { SyncWorker } from '../workers/sync.worker.core';

export function createSyncRoutes(worker: SyncWorker): Router {
  const router = Router();

  // POST /sync - run one cycle now
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      logger.info({ req: { id: req.id } }, 'Manual sync requested');
      const outcome = await worker.runOnce('manual');

      if (outcome.status === 'skipped') {
        throw new SyncInProgressError();
      }
      if (outcome.status === 'failed') {
        throw new SyncCycleError(outcome.error);
      }

      res.json({
        success: true,
        data: outcome.result,
      });
    } catch (error) {
      next(error);
    }
  });

  // GET /sync/status
  router.get('/status', (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: worker.getStatus(),
    });
  });

  // GET /sync/last-result - null until the first cycle finishes
  router.get('/last-result', (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: worker.getLastResult(),
    });
  });

  // POST /sync/start - start the recurring loop
  router.post('/start', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { intervalMs = config.SYNC_INTERVAL_MS } = parseRequest(StartSyncRequestSchema, req.body ?? {}, 'body');
      const started = worker.start(intervalMs);

      res.json({
        success: true,
        data: { started, looping: worker.isLooping(), intervalMs: worker.getStatus().intervalMs },
      });
    } catch (error) {
      next(error);
    }
  });

  // POST /sync/stop - waits for a running cycle
  router.post('/stop', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const wasLooping = worker.isLooping();
      await worker.stop();

      res.json({
        success: true,
        data: { stopped: wasLooping, looping: worker.isLooping() },
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
