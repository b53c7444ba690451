/**
 * HTTP safety middleware: rate limit, timeout, CORS, request and error logs
 */

import rateLimit from 'express-rate-limit';
import { NextFunction, Request, RequestHandler, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { MetricsServiceError } from '../../errors/metric-errors';

const RATE_WINDOW_MINUTES = 15;

/** Read-only API apart from cache administration */
const CORS_METHODS = 'GET, POST, DELETE, OPTIONS';

const SECRET_KEY = /password|secret|token|auth/i;

/**
 * Per-IP limit on /api. Health and /metrics are mounted outside it.
 */
export function createApiRateLimiter(limit: number): RequestHandler {
  return rateLimit({
    windowMs: RATE_WINDOW_MINUTES * 60 * 1000,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: 'rate_limit_exceeded',
      reason: `At most ${limit} requests per ${RATE_WINDOW_MINUTES} minutes`,
      details: { limit, window_minutes: RATE_WINDOW_MINUTES }
    }
  });
}

/**
 * 504 in the API error shape when no response went out within `timeoutMs`.
 * The computation itself is not cancelled; its late response is dropped.
 */
export function requestTimeout(timeoutMs: number): RequestHandler {
  return (_req: Request, res: Response, next: NextFunction) => {
    const timer = setTimeout(() => {
      if (res.headersSent) {
        return;
      }
      res.status(504).json({
        error: 'request_timeout',
        reason: `No response within ${timeoutMs}ms`,
        details: { timeout_ms: timeoutMs }
      });
    }, timeoutMs);

    const stop = () => clearTimeout(timer);
    res.once('finish', stop);
    res.once('close', stop);

    next();
  };
}

export function configureCORS(allowedOrigins: readonly string[]): RequestHandler {
  const allowed = new Set(allowedOrigins);

  return (req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;

    // no origin: curl and server-side callers
    if (origin === undefined) {
      res.header('Access-Control-Allow-Origin', '*');
    } else if (allowed.has(origin)) {
      res.header('Access-Control-Allow-Origin', origin);
      res.header('Vary', 'Origin');
    }

    res.header('Access-Control-Allow-Methods', CORS_METHODS);
    res.header('Access-Control-Allow-Headers', 'Content-Type');
    res.header('Access-Control-Max-Age', '86400');

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }

    next();
  };
}

/**
 * One JSON line per finished request; the id is echoed in X-Request-ID
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const started = Date.now();
  const requestId = uuidv4();
  res.setHeader('X-Request-ID', requestId);

  res.once('finish', () => {
    console.log(JSON.stringify({
      type: 'request',
      request_id: requestId,
      timestamp: new Date(started).toISOString(),
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Date.now() - started
    }));
  });

  next();
}

/** Hide the user:password part of postgres:// and redis:// URLs */
export function maskConnectionStrings(text: string): string {
  return text.replace(/\b(postgres(?:ql)?|rediss?):\/\/[^@\s/]+@/gi, '$1://***:***@');
}

/**
 * Log context with secret-looking keys blanked and URLs masked.
 * Contexts are flat records of route, path and metric fields.
 */
export function maskLogContext(context: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (SECRET_KEY.test(key)) {
      masked[key] = '***';
    } else {
      masked[key] = typeof value === 'string' ? maskConnectionStrings(value) : value;
    }
  }
  return masked;
}

export function logError(error: unknown, context?: Record<string, unknown>): void {
  const message = error instanceof Error ? error.message : String(error);

  console.error(JSON.stringify({
    type: 'error',
    timestamp: new Date().toISOString(),
    name: error instanceof Error ? error.name : typeof error,
    code: error instanceof MetricsServiceError ? error.code : undefined,
    message: maskConnectionStrings(message),
    stack: process.env.NODE_ENV === 'development' && error instanceof Error ? error.stack : undefined,
    context: context ? maskLogContext(context) : undefined
  }));
}
