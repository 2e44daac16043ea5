import { Router } from 'express';
import { logger } from '../core/logger';
import { metrics } from '../utils/metrics';
import { fileSystemBreaker } from '../utils/circuitBreaker';
import { getBulkheadMetrics } from '../utils/bulkhead';
import type { SyncWorker } from '../workers/sync.worker.core';

export function createMetricsRoutes(worker: SyncWorker): Router {
  const router = Router();

  // GET /metrics - counters plus breaker and bulkhead state
  router.get('/', (req, res) => {
    logger.debug({ req: { id: req.id } }, 'Metrics requested');

    res.json({
      success: true,
      data: {
        ...metrics.getMetrics(),
        circuitBreakers: [...worker.getStatus().breakers, fileSystemBreaker.getStats()],
        bulkheads: getBulkheadMetrics(),
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      },
    });
  });

  // POST /metrics/reset - zero the counters (for testing)
  router.post('/reset', (req, res) => {
    logger.info({ req: { id: req.id } }, 'Metrics reset requested');
    metrics.reset();

    res.json({
      success: true,
      message: 'Metrics reset successfully',
    });
  });

  return router;
}
