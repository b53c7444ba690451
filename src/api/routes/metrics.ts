import { Router, Request, Response } from 'express';
import { MetricRegistry } from '../../metrics/registry';
import { sendError, sendServiceError } from '../http-errors';
import { parseMetricNames, parseMetricParams } from '../params';

export function createMetricRoutes(registry: MetricRegistry): Router {
  const router = Router();

  router.get('/available', (_req: Request, res: Response) => {
    const groups = registry.groups();
    res.status(200).json({
      ...groups,
      total_metrics:
        groups.driver_metrics.length + groups.constructor_metrics.length + groups.comparison_metrics.length,
    });
  });

  router.get('/:metric_name/info', (req: Request, res: Response) => {
    try {
      res.status(200).json(registry.describe(req.params.metric_name));
    } catch (err) {
      sendServiceError(res, err, { route: 'metric_info', metric_name: req.params.metric_name });
    }
  });

  // registered before /:metric_name so "bulk" is never taken for a metric name
  router.post('/bulk', async (req: Request, res: Response) => {
    try {
      const names = parseMetricNames(req.body);
      const params = parseMetricParams(req.body);
      const bulk = await registry.calculateBulk(names, params);

      if (bulk.results.length === 0) {
        sendError(res, 400, {
          error: 'bulk_failed',
          reason: 'All requested metrics failed',
          details: { errors: bulk.errors },
        });
        return;
      }

      res.status(200).json(bulk);
    } catch (err) {
      sendServiceError(res, err, { route: 'metrics_bulk' });
    }
  });

  router.post('/:metric_name', async (req: Request, res: Response) => {
    const metricName = req.params.metric_name;
    try {
      const params = parseMetricParams(req.body);
      const result = await registry.calculate(metricName, params);
      res.status(200).json(result);
    } catch (err) {
      sendServiceError(res, err, { route: 'metric_calculate', metric_name: metricName });
    }
  });

  return router;
}
