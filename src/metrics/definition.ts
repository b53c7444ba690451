import { TableName } from '../types/tables';
import { MetricParamName, MetricParams, MetricResult, MetricScope } from '../types/metrics';
import { ViewFilter } from '../types/views';
import { ViewBuilder } from '../views/view-builder';

/**
 * One entry of the metric catalog
 *
 * `calculate` is a pure function of the views and the parameters; it may
 * throw data faults (missing tables, malformed rows), which the registry
 * turns into null-valued results.
 */
export interface MetricDefinition {
  name: string;
  description: string;
  unit: string;
  scope: MetricScope;
  /** Parameters that must be present (non-null) */
  requires: MetricParamName[];
  requiredTables: TableName[];
  calculate(views: ViewBuilder, params: MetricParams): Promise<MetricResult>;
}

export function viewFilter(params: MetricParams): ViewFilter {
  return {
    season: params.season ?? null,
    raceIds: params.race_ids ?? null,
    driverId: params.driver_id ?? null,
    constructorId: params.constructor_id ?? null,
  };
}

/**
 * Same filter, without the driver/constructor restriction; for field-wide
 * comparisons within the same race set
 */
export function raceSetFilter(params: MetricParams): ViewFilter {
  return {
    season: params.season ?? null,
    raceIds: params.race_ids ?? null,
  };
}

export function requireParam(params: MetricParams, name: 'driver_id' | 'constructor_id'): number {
  const value = params[name];
  if (value === undefined || value === null) {
    // the registry validates `requires` first; reaching this is a catalog bug
    throw new Error(`${name} is required`);
  }
  return value;
}
