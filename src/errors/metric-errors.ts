/**
 * Error taxonomy for the metrics service
 *
 * - not_found:         a backing table/resource is absent
 * - malformed_data:    schema or type violation in raw data
 * - data_unavailable:  a view cannot be built because a required table is missing
 * - unknown_metric:    registry lookup miss
 * - invalid_parameter: metric requested with missing or invalid parameters
 *
 * Data faults (the first three) are turned into null-valued results by the
 * registry. Registry faults abort one metric, never a whole batch.
 */

export type MetricsErrorCode =
  | 'not_found'
  | 'malformed_data'
  | 'data_unavailable'
  | 'unknown_metric'
  | 'invalid_parameter';

export abstract class MetricsServiceError extends Error {
  abstract readonly code: MetricsErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends MetricsServiceError {
  readonly code = 'not_found';

  constructor(readonly resource: string, detail?: string) {
    super(detail ? `Resource not found: ${resource} (${detail})` : `Resource not found: ${resource}`);
  }
}

export class MalformedDataError extends MetricsServiceError {
  readonly code = 'malformed_data';

  constructor(readonly table: string, message: string) {
    super(`Malformed data in ${table}: ${message}`);
  }
}

export class DataUnavailableError extends MetricsServiceError {
  readonly code = 'data_unavailable';

  constructor(readonly view: string, readonly table: string) {
    super(`View ${view} unavailable: required table ${table} is missing`);
  }
}

export class UnknownMetricError extends MetricsServiceError {
  readonly code = 'unknown_metric';

  constructor(readonly metricName: string) {
    super(`Metric '${metricName}' not found`);
  }
}

export class InvalidParameterError extends MetricsServiceError {
  readonly code = 'invalid_parameter';

  constructor(readonly parameter: string, message: string) {
    super(message);
  }
}

/**
 * Faults raised while loading tables or building views.
 * These become a definitive "no result" rather than an exception.
 */
export function isDataFault(err: unknown): err is NotFoundError | MalformedDataError | DataUnavailableError {
  return (
    err instanceof NotFoundError ||
    err instanceof MalformedDataError ||
    err instanceof DataUnavailableError
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
