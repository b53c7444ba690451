import { Response } from 'express';
import {
  DataUnavailableError,
  InvalidParameterError,
  MalformedDataError,
  NotFoundError,
  UnknownMetricError,
} from '../errors/metric-errors';
import { logError } from './middleware/production-safety';

export interface ErrorBody {
  error: string;
  reason: string;
  details?: Record<string, unknown>;
}

export function sendError(res: Response, status: number, body: ErrorBody): void {
  if (res.headersSent) {
    return;
  }
  res.status(status).json(body);
}

/**
 * Map a thrown error onto an HTTP response.
 * Anything outside the service taxonomy is logged and answered with 500.
 */
export function sendServiceError(res: Response, err: unknown, context: Record<string, unknown>): void {
  if (err instanceof UnknownMetricError) {
    sendError(res, 404, { error: err.code, reason: err.message, details: { metric_name: err.metricName } });
    return;
  }
  if (err instanceof InvalidParameterError) {
    sendError(res, 400, { error: err.code, reason: err.message, details: { parameter: err.parameter } });
    return;
  }
  if (err instanceof NotFoundError) {
    sendError(res, 404, { error: err.code, reason: err.message });
    return;
  }
  if (err instanceof DataUnavailableError) {
    sendError(res, 503, { error: err.code, reason: err.message, details: { view: err.view, table: err.table } });
    return;
  }
  if (err instanceof MalformedDataError) {
    logError(err, context);
    sendError(res, 503, { error: err.code, reason: err.message, details: { table: err.table } });
    return;
  }

  logError(err, context);
  sendError(res, 500, { error: 'execution_failed', reason: 'Unexpected error while handling the request' });
}
