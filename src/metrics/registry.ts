/**
 * METRIC REGISTRY
 *
 * Closed catalog of metric definitions, built once at startup.
 * Every calculation goes through the metric cache first; data faults
 * (missing tables, malformed rows) come back as null-valued results and
 * are never cached.
 */

import { MetricCache } from '../cache/metric-cache';
import {
  errorMessage,
  InvalidParameterError,
  isDataFault,
  UnknownMetricError,
} from '../errors/metric-errors';
import { serviceMetrics } from '../observability/metrics';
import { BulkResult, MetricInfo, MetricParams, MetricResult } from '../types/metrics';
import { ViewBuilder } from '../views/view-builder';
import { CONSTRUCTOR_CHAMPIONSHIP_METRICS } from './constructor/championship';
import { CONSTRUCTOR_COMPETITIVENESS_METRICS } from './constructor/competitiveness';
import { CONSTRUCTOR_LAP_METRICS } from './constructor/lap-performance';
import { CONSTRUCTOR_PIT_STOP_METRICS } from './constructor/pit-stops';
import { CONSTRUCTOR_QUALIFYING_METRICS } from './constructor/qualifying';
import { CONSTRUCTOR_RACE_METRICS } from './constructor/race-performance';
import { CONSTRUCTOR_RELIABILITY_METRICS } from './constructor/reliability';
import { MetricDefinition } from './definition';
import { DRIVER_CHAMPIONSHIP_METRICS } from './driver/championship';
import { DRIVER_QUALIFYING_METRICS } from './driver/qualifying';
import { DRIVER_RACE_METRICS } from './driver/race';
import { DRIVER_TEAMMATE_METRICS } from './driver/teammate';
import { metricResult } from './result';

// ============================================================================
// CATALOG
// ============================================================================

/** Driver-vs-driver metrics, listed apart from single-driver ones */
const COMPARISON_METRICS: readonly MetricDefinition[] = DRIVER_TEAMMATE_METRICS;

export const METRIC_CATALOG: readonly MetricDefinition[] = [
  ...DRIVER_RACE_METRICS,
  ...DRIVER_QUALIFYING_METRICS,
  ...DRIVER_TEAMMATE_METRICS,
  ...DRIVER_CHAMPIONSHIP_METRICS,
  ...CONSTRUCTOR_CHAMPIONSHIP_METRICS,
  ...CONSTRUCTOR_RACE_METRICS,
  ...CONSTRUCTOR_QUALIFYING_METRICS,
  ...CONSTRUCTOR_RELIABILITY_METRICS,
  ...CONSTRUCTOR_PIT_STOP_METRICS,
  ...CONSTRUCTOR_LAP_METRICS,
  ...CONSTRUCTOR_COMPETITIVENESS_METRICS,
];

export interface CatalogGroups {
  driver_metrics: MetricInfo[];
  constructor_metrics: MetricInfo[];
  comparison_metrics: MetricInfo[];
}

export function describeDefinition(definition: MetricDefinition): MetricInfo {
  return {
    name: definition.name,
    description: definition.description,
    unit: definition.unit,
    scope: definition.scope,
    required_params: [...definition.requires],
    required_tables: [...definition.requiredTables],
  };
}

// ============================================================================
// REGISTRY
// ============================================================================

export class MetricRegistry {
  private readonly definitions = new Map<string, MetricDefinition>();

  constructor(
    private readonly views: ViewBuilder,
    private readonly cache: MetricCache,
    catalog: readonly MetricDefinition[] = METRIC_CATALOG
  ) {
    for (const definition of catalog) {
      if (this.definitions.has(definition.name)) {
        throw new Error(`Duplicate metric definition: ${definition.name}`);
      }
      this.definitions.set(definition.name, definition);
    }
  }

  has(metricName: string): boolean {
    return this.definitions.has(metricName);
  }

  list(): MetricInfo[] {
    return [...this.definitions.values()].map(describeDefinition);
  }

  describe(metricName: string): MetricInfo {
    return describeDefinition(this.lookup(metricName));
  }

  groups(): CatalogGroups {
    const comparison = new Set(COMPARISON_METRICS.map(d => d.name));
    const groups: CatalogGroups = { driver_metrics: [], constructor_metrics: [], comparison_metrics: [] };

    for (const definition of this.definitions.values()) {
      const info = describeDefinition(definition);
      if (comparison.has(definition.name)) {
        groups.comparison_metrics.push(info);
      } else if (definition.scope === 'driver') {
        groups.driver_metrics.push(info);
      } else {
        groups.constructor_metrics.push(info);
      }
    }
    return groups;
  }

  /**
   * Calculate one metric, cache first
   *
   * @throws UnknownMetricError when the name is not in the catalog
   * @throws InvalidParameterError when a required parameter is absent
   */
  async calculate(metricName: string, params: MetricParams): Promise<MetricResult> {
    const definition = this.lookup(metricName);
    this.validateRequired(definition, params);
    serviceMetrics.incrementMetricRequest(metricName);

    const cached = await this.cache.get(metricName, params);
    if (cached) {
      return cached;
    }

    const start = Date.now();
    let result: MetricResult;
    try {
      result = await definition.calculate(this.views, params);
    } catch (err) {
      if (!isDataFault(err)) {
        serviceMetrics.incrementError('calculation_failed');
        throw err;
      }
      serviceMetrics.incrementError(err.code);
      console.warn(`[MetricRegistry] ${metricName} returned no result: ${err.message}`);
      return this.withNames(
        metricResult(metricName, null, params, { error: err.message, error_type: err.code }),
        params
      );
    } finally {
      serviceMetrics.recordComputeLatency(Date.now() - start);
    }

    const named = await this.withNames(result, params);
    await this.cache.set(metricName, params, named);
    return named;
  }

  /**
   * Calculate several metrics with the same parameters.
   * A failing metric is reported in `errors` and never fails the batch.
   */
  async calculateBulk(metricNames: readonly string[], params: MetricParams): Promise<BulkResult> {
    const settled = await Promise.all(
      metricNames.map(async name => {
        try {
          return { ok: true as const, result: await this.calculate(name, params) };
        } catch (err) {
          return { ok: false as const, error: { metric_name: name, message: errorMessage(err) } };
        }
      })
    );

    const bulk: BulkResult = { results: [], errors: [] };
    for (const outcome of settled) {
      if (outcome.ok) {
        bulk.results.push(outcome.result);
      } else {
        bulk.errors.push(outcome.error);
      }
    }
    return bulk;
  }

  private lookup(metricName: string): MetricDefinition {
    const definition = this.definitions.get(metricName);
    if (!definition) {
      serviceMetrics.incrementError('unknown_metric');
      throw new UnknownMetricError(metricName);
    }
    return definition;
  }

  private validateRequired(definition: MetricDefinition, params: MetricParams): void {
    for (const param of definition.requires) {
      const value = params[param];
      if (value === undefined || value === null) {
        serviceMetrics.incrementError('invalid_parameter');
        throw new InvalidParameterError(param, `Metric '${definition.name}' requires parameter '${param}'`);
      }
    }
  }

  /**
   * Fill driver_name / constructor_name from the reference tables.
   * A missing reference table leaves the names out.
   */
  private async withNames(result: MetricResult, params: MetricParams): Promise<MetricResult> {
    const named: MetricResult = { ...result };

    try {
      if (params.driver_id !== undefined && params.driver_id !== null) {
        const driver = await this.views.getDriver(params.driver_id);
        named.driver_name = driver ? driver.fullName : null;
      }
      if (params.constructor_id !== undefined && params.constructor_id !== null) {
        const team = await this.views.getConstructor(params.constructor_id);
        named.constructor_name = team ? team.name : null;
      }
    } catch (err) {
      if (!isDataFault(err)) {
        throw err;
      }
      console.warn(`[MetricRegistry] Names unavailable for ${result.metric_name}: ${err.message}`);
    }

    return named;
  }
}
