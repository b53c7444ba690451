import express, { Express, NextFunction, Request, Response } from 'express';
import { createMetricsRouter, metricsMiddleware } from '../observability/metrics';
import { Services } from '../services';
import { sendError } from './http-errors';
import {
  configureCORS,
  createApiRateLimiter,
  logError,
  requestLogger,
  requestTimeout
} from './middleware/production-safety';
import { createRoutes } from './routes';
import { createHealthRoutes } from './routes/health';

export interface AppOptions {
  /** Off in tests, where one client sends every request */
  rateLimit?: boolean;
  /** Off in tests to keep output quiet */
  requestLogging?: boolean;
}

function clientErrorStatus(err: unknown): number | null {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : null;
  }
  return null;
}

export function createApp(services: Services, options: AppOptions = {}): Express {
  const app = express();

  // first, so every request is counted
  app.use(metricsMiddleware());

  if (options.requestLogging !== false) {
    app.use(requestLogger);
  }

  app.use(requestTimeout(services.settings.requestTimeoutMs));

  // 16KB body limit
  app.use(express.json({ limit: '16kb' }));

  app.use(configureCORS(services.settings.corsOrigins));

  if (options.rateLimit !== false) {
    app.use('/api', createApiRateLimiter(services.settings.rateLimitPerWindow));
  }

  // no rate limiting on observability endpoints
  app.use('/', createMetricsRouter());
  app.use('/', createHealthRoutes(services));
  app.use('/api/v1', createRoutes(services));

  app.use((req: Request, res: Response) => {
    sendError(res, 404, { error: 'not_found', reason: `No route for ${req.method} ${req.path}` });
  });

  // body parser rejections (malformed JSON, oversized body) and anything a handler let through
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(err);
    if (status !== null) {
      sendError(res, status, {
        error: status === 413 ? 'payload_too_large' : 'invalid_request_body',
        reason: err instanceof Error ? err.message : 'Invalid request body',
      });
      return;
    }
    logError(err, { path: req.path, method: req.method });
    sendError(res, 500, { error: 'execution_failed', reason: 'Unexpected error while handling the request' });
  });

  return app;
}
