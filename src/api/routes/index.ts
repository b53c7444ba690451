import { Router, Request, Response } from 'express';
import { API_VERSION } from '../../config/versioning';
import { Services } from '../../services';
import { createCacheRoutes } from './cache';
import { createConstructorRoutes } from './constructors';
import { createDriverRoutes } from './drivers';
import { createMetricRoutes } from './metrics';

/**
 * Versioned API, mounted under /api/v1
 */
export function createRoutes(services: Services): Router {
  const router = Router();

  router.use('/metrics', createMetricRoutes(services.registry));
  router.use('/drivers', createDriverRoutes(services.views));
  router.use('/constructors', createConstructorRoutes(services.views));
  router.use('/cache', createCacheRoutes(services.cache, services.tables, services.registry));

  router.get('/', (_req: Request, res: Response) => {
    res.status(200).json({
      name: 'Race Metrics API',
      description: 'Driver and constructor performance metrics over historical race data',
      version: API_VERSION,
      total_metrics: services.registry.list().length,
      endpoints: buildEndpointList(),
    });
  });

  return router;
}

function buildEndpointList(): Record<string, string> {
  return {
    'GET /api/v1/metrics/available': 'Metric catalog',
    'GET /api/v1/metrics/:metric_name/info': 'Metric definition',
    'POST /api/v1/metrics/bulk': 'Calculate several metrics with the same parameters',
    'POST /api/v1/metrics/:metric_name': 'Calculate one metric',
    'GET /api/v1/drivers': 'Driver list (start_year, end_year, active_only)',
    'GET /api/v1/drivers/search/:query': 'Driver search',
    'GET /api/v1/drivers/:driver_id': 'Driver details',
    'GET /api/v1/drivers/:driver_id/races': 'Races driven (season, limit)',
    'GET /api/v1/constructors': 'Constructor list (start_year, end_year, active_only)',
    'GET /api/v1/constructors/search/:query': 'Constructor search',
    'GET /api/v1/constructors/:constructor_id': 'Constructor details',
    'GET /api/v1/constructors/:constructor_id/races': 'Races entered (season, limit)',
    'GET /api/v1/cache/stats': 'Metric cache statistics',
    'DELETE /api/v1/cache': 'Clear the metric cache (metric_name)',
    'POST /api/v1/cache/tables/reload': 'Drop loaded tables so they are read again',
    'GET /health': 'Health check',
    'GET /metrics': 'Prometheus metrics',
    'GET /metrics/json': 'JSON metrics',
  };
}
