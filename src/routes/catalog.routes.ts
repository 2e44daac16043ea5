import { Router, NextFunction, Request, Response } from 'express';
import { logger } from '../core/logger';
import { NotFoundError } from '../core/errors';
import {
  AlertsQuerySchema,
  ItemKeyParamsSchema,
  ItemsQuerySchema,
  TopItemsQuerySchema,
} from '../core/types';
import { parseRequest } from '../middleware/validate';
import {
  catalogSummary,
  categoryBreakdown,
  topItemsByValue,
} from '../services/catalog.analytics';
import type { SyncWorker } from '../workers/sync.worker.core';

/**
 * Read-only views over the worker's published snapshot
 */
export function createCatalogRoutes(worker: SyncWorker): Router {
  const router = Router();

  // GET /catalog/items?syncState=&platform=&category=
  router.get('/items', (req: Request, res: Response, next: NextFunction) => {
    try {
      const filters = parseRequest(ItemsQuerySchema, req.query, 'query');
      const items = [...worker.getSnapshot().values()].filter((item) =>
        (filters.syncState === undefined || item.syncState === filters.syncState)
        && (filters.platform === undefined || item.sourcePlatforms.includes(filters.platform))
        && (filters.category === undefined || item.category === filters.category)
      );

      res.json({
        success: true,
        data: { count: items.length, items },
      });
    } catch (error) {
      next(error);
    }
  });

  // GET /catalog/items/:key
  router.get('/items/:key', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { key } = parseRequest(ItemKeyParamsSchema, req.params, 'params');
      const item = worker.getSnapshot().get(key);
      if (!item) {
        throw NotFoundError.catalogItem(key);
      }

      res.json({
        success: true,
        data: item,
      });
    } catch (error) {
      next(error);
    }
  });

  // GET /catalog/alerts?threshold=
  router.get('/alerts', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { threshold = worker.getLowStockThreshold() } = parseRequest(AlertsQuerySchema, req.query, 'query');
      const alerts = worker.lowStockAlerts(threshold);
      logger.debug({ req: { id: req.id }, threshold, alerts: alerts.length }, 'Low-stock alerts requested');

      res.json({
        success: true,
        data: { threshold, count: alerts.length, alerts },
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/categories', (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: categoryBreakdown(worker.getSnapshot()),
    });
  });

  // GET /catalog/top?limit=
  router.get('/top', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = parseRequest(TopItemsQuerySchema, req.query, 'query');
      res.json({
        success: true,
        data: topItemsByValue(worker.getSnapshot(), limit),
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/summary', (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: catalogSummary(worker.getSnapshot(), worker.getLowStockThreshold()),
    });
  });

  return router;
}
