import { Router, Request, Response } from 'express';
import { API_VERSION, CACHE_SCHEMA_VERSION } from '../../config/versioning';
import { Services } from '../../services';

export function createHealthRoutes(services: Services): Router {
  const router = Router();

  router.get('/health', async (_req: Request, res: Response) => {
    const cache = await services.cache.stats();

    res.status(200).json({
      status: 'healthy',
      version: API_VERSION,
      cache_schema_version: CACHE_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      data_source: services.tables.describeSource(),
      min_year: services.settings.minYear,
      loaded_tables: services.tables.loadedTables(),
      cache,
    });
  });

  // liveness
  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).send('OK');
  });

  return router;
}
