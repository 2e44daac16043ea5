import { Router } from 'express';
import { logger } from '../core/logger';
import { getBulkheadMetrics } from '../utils/bulkhead';
import { fileSystemBreaker } from '../utils/circuitBreaker';
import type { SyncWorker } from '../workers/sync.worker.core';

export function createHealthRoutes(worker: SyncWorker): Router {
  const router = Router();

  // Basic health check
  router.get('/', (req, res) => {
    logger.debug({ req: { id: req.id } }, 'Health check requested');
    res.json({
      success: true,
      data: {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      },
    });
  });

  // Liveness probe - the process answers
  router.get('/liveness', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // Readiness probe - not ready while any breaker is open
  router.get('/readiness', (req, res) => {
    logger.debug({ req: { id: req.id } }, 'Readiness check requested');

    const breakers = [...worker.getStatus().breakers, fileSystemBreaker.getStats()];
    const openBreakers = breakers.filter((breaker) => breaker.state === 'open').map((breaker) => breaker.name);
    const bulkheads = getBulkheadMetrics();
    const queueOverThreshold = Object.values(bulkheads).some(
      (bulkhead) => bulkhead.queued > bulkhead.queueSize * 0.8
    );
    const ready = openBreakers.length === 0 && !queueOverThreshold;

    res.status(ready ? 200 : 503).json({
      ready,
      timestamp: new Date().toISOString(),
      openBreakers,
      queueOverThreshold,
      breakers,
      bulkheads,
    });
  });

  return router;
}
