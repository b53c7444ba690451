/**
 * Metric request / result types (wire format is snake_case)
 */

export type MetadataValue =
  | number
  | string
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue };

export type Metadata = { [key: string]: MetadataValue };

/** A scalar, no result, or a structured breakdown */
export type MetricValue = number | null | Metadata;

export interface MetricParams {
  driver_id?: number | null;
  constructor_id?: number | null;
  season?: number | null;
  race_ids?: number[] | null;
}

export type MetricParamName = keyof MetricParams;

export interface MetricResult {
  metric_name: string;
  value: MetricValue;
  driver_id?: number | null;
  driver_name?: string | null;
  constructor_id?: number | null;
  constructor_name?: string | null;
  season?: number | null;
  metadata?: Metadata;
}

export type MetricScope = 'driver' | 'constructor';

export interface MetricInfo {
  name: string;
  description: string;
  unit: string;
  scope: MetricScope;
  required_params: MetricParamName[];
  required_tables: string[];
}

export interface BulkError {
  metric_name: string;
  message: string;
}

export interface BulkResult {
  results: MetricResult[];
  errors: BulkError[];
}
