import express from 'express';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { requestIdMiddleware } from './middleware/request-id';
import { requestLoggerMiddleware } from './middleware/request-logger';
import { createHealthRoutes } from './routes/health.routes';
import { createCatalogRoutes } from './routes/catalog.routes';
import { createSyncRoutes } from './routes/sync.routes';
import { createMetricsRoutes } from './routes/metrics.routes';
import type { SyncWorker } from './workers/sync.worker.core';

/**
 * HTTP trigger surface over one sync worker
 */
export function createApp(worker: SyncWorker): express.Express {
  const app = express();

  app.use(requestIdMiddleware);
  app.use(requestLoggerMiddleware);
  app.use(express.json());

  app.use('/api/health', createHealthRoutes(worker));
  app.use('/api/sync', createSyncRoutes(worker));
  app.use('/api/catalog', createCatalogRoutes(worker));
  app.use('/api/metrics', createMetricsRoutes(worker));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
