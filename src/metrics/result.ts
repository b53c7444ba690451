import { Metadata, MetadataValue, MetricParams, MetricResult, MetricValue } from '../types/metrics';

/**
 * Input accepted by metric() before normalization. Formulas may produce
 * NaN or Infinity (0/0 averages); those become null.
 */
export type MetadataInput =
  | number
  | string
  | boolean
  | null
  | undefined
  | MetadataInput[]
  | { [key: string]: MetadataInput };

export type MetadataInputRecord = { [key: string]: MetadataInput };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function normalizeMetadataValue(value: MetadataInput): MetadataValue {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(normalizeMetadataValue);
  }
  return normalizeMetadata(value);
}

export function normalizeMetadata(input: MetadataInputRecord): Metadata {
  const normalized: Metadata = {};
  for (const [key, value] of Object.entries(input)) {
    normalized[key] = normalizeMetadataValue(value);
  }
  return normalized;
}

function normalizeValue(value: number | null | MetadataInputRecord): MetricValue {
  if (value === null) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  return normalizeMetadata(value);
}

/**
 * Build a MetricResult echoing the request parameters
 */
export function metricResult(
  metricName: string,
  value: number | null | MetadataInputRecord,
  params: MetricParams,
  metadata?: MetadataInputRecord
): MetricResult {
  const result: MetricResult = {
    metric_name: metricName,
    value: normalizeValue(value),
  };

  if (params.driver_id !== undefined && params.driver_id !== null) {
    result.driver_id = params.driver_id;
  }
  if (params.constructor_id !== undefined && params.constructor_id !== null) {
    result.constructor_id = params.constructor_id;
  }
  if (params.season !== undefined && params.season !== null) {
    result.season = params.season;
  }
  if (metadata) {
    result.metadata = normalizeMetadata(metadata);
  }

  return result;
}

/** A definitive "nothing to compute" answer, e.g. no rows for the filter */
export function emptyResult(metricName: string, params: MetricParams, message: string): MetricResult {
  return metricResult(metricName, null, params, { message });
}

// ============================================================================
// VALIDATION (stored entries)
// ============================================================================

export function isMetadataValue(value: unknown): value is MetadataValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isMetadataValue);
  }
  if (isPlainObject(value)) {
    return Object.values(value).every(isMetadataValue);
  }
  return false;
}

export function isMetadata(value: unknown): value is Metadata {
  return isPlainObject(value) && Object.values(value).every(isMetadataValue);
}

function isOptionalInt(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'number' && Number.isInteger(value));
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || value === null || typeof value === 'string';
}

/**
 * Structural check for a result read back from the cache
 */
export function isMetricResult(value: unknown): value is MetricResult {
  if (!isPlainObject(value)) {
    return false;
  }
  if (typeof value.metric_name !== 'string') {
    return false;
  }

  const metricValue = value.value;
  const validValue =
    metricValue === null ||
    (typeof metricValue === 'number' && Number.isFinite(metricValue)) ||
    isMetadata(metricValue);

  return (
    validValue &&
    isOptionalInt(value.driver_id) &&
    isOptionalString(value.driver_name) &&
    isOptionalInt(value.constructor_id) &&
    isOptionalString(value.constructor_name) &&
    isOptionalInt(value.season) &&
    (value.metadata === undefined || isMetadata(value.metadata))
  );
}
