import { Router, Request, Response } from 'express';
import { MetricCache } from '../../cache/metric-cache';
import { TableStore } from '../../data/table-store';
import { MetricRegistry } from '../../metrics/registry';
import { sendError, sendServiceError } from '../http-errors';
import { optionalStringQuery } from '../params';

export function createCacheRoutes(cache: MetricCache, tables: TableStore, registry: MetricRegistry): Router {
  const router = Router();

  router.get('/stats', async (_req: Request, res: Response) => {
    try {
      res.status(200).json(await cache.stats());
    } catch (err) {
      sendServiceError(res, err, { route: 'cache_stats' });
    }
  });

  router.delete('/', async (req: Request, res: Response) => {
    try {
      const metricName = optionalStringQuery(req.query, 'metric_name');
      if (metricName !== null && !registry.has(metricName)) {
        sendError(res, 404, {
          error: 'unknown_metric',
          reason: `Metric '${metricName}' not found`,
          details: { metric_name: metricName },
        });
        return;
      }

      const cleared = await cache.clear(metricName ?? undefined);
      res.status(200).json({ cleared, metric_name: metricName });
    } catch (err) {
      sendServiceError(res, err, { route: 'cache_clear' });
    }
  });

  // cached results were computed from the tables being dropped
  router.post('/tables/reload', async (_req: Request, res: Response) => {
    try {
      const unloaded = tables.loadedTables();
      tables.clear();
      const cleared = await cache.clear();
      res.status(200).json({ reloaded: true, unloaded_tables: unloaded, cleared_results: cleared });
    } catch (err) {
      sendServiceError(res, err, { route: 'tables_reload' });
    }
  });

  return router;
}
