/**
 * SERVICE OBSERVABILITY - METRICS COLLECTION
 *
 * Lightweight in-process collector, exposed as a Prometheus-compatible
 * /metrics endpoint and a JSON summary.
 *
 * Collected:
 * - Metric computation latency histogram
 * - Total request latency
 * - Metric cache hit/miss rates
 * - Raw table loads
 * - Requests per metric name
 * - Errors by type
 */

import { Router, Request, Response, NextFunction } from 'express';

// Histogram bucket boundaries (milliseconds)
const LATENCY_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000];

interface HistogramData {
  buckets: Map<number, number>;
  sum: number;
  count: number;
}

export class MetricsCollector {
  // Histograms
  private computeLatency: HistogramData;
  private totalRequestLatency: HistogramData;

  // Counters
  private cacheHits: number = 0;
  private cacheMisses: number = 0;
  private cacheWriteFailures: number = 0;
  private tableLoads: Map<string, number> = new Map();
  private requestsByMetric: Map<string, number> = new Map();
  private errorsByType: Map<string, number> = new Map();

  // Gauges
  private activeConcurrentRequests: number = 0;
  private peakConcurrentRequests: number = 0;

  constructor() {
    this.computeLatency = this.createHistogram();
    this.totalRequestLatency = this.createHistogram();
  }

  private createHistogram(): HistogramData {
    const buckets = new Map<number, number>();
    LATENCY_BUCKETS.forEach(b => buckets.set(b, 0));
    buckets.set(Infinity, 0);
    return { buckets, sum: 0, count: 0 };
  }

  private recordHistogram(histogram: HistogramData, value: number): void {
    histogram.sum += value;
    histogram.count += 1;

    for (const bucket of LATENCY_BUCKETS) {
      if (value <= bucket) {
        histogram.buckets.set(bucket, (histogram.buckets.get(bucket) || 0) + 1);
      }
    }
    histogram.buckets.set(Infinity, (histogram.buckets.get(Infinity) || 0) + 1);
  }

  recordComputeLatency(ms: number): void {
    this.recordHistogram(this.computeLatency, ms);
  }

  recordRequestLatency(ms: number): void {
    this.recordHistogram(this.totalRequestLatency, ms);
  }

  incrementMetricRequest(metricName: string): void {
    this.requestsByMetric.set(metricName, (this.requestsByMetric.get(metricName) || 0) + 1);
  }

  incrementError(errorType: string): void {
    this.errorsByType.set(errorType, (this.errorsByType.get(errorType) || 0) + 1);
  }

  incrementTableLoad(table: string): void {
    this.tableLoads.set(table, (this.tableLoads.get(table) || 0) + 1);
  }

  // Cache metrics
  incrementCacheHit(): void {
    this.cacheHits++;
  }

  incrementCacheMiss(): void {
    this.cacheMisses++;
  }

  incrementCacheWriteFailure(): void {
    this.cacheWriteFailures++;
  }

  // Concurrency tracking
  incrementConcurrentRequests(): void {
    this.activeConcurrentRequests++;
    if (this.activeConcurrentRequests > this.peakConcurrentRequests) {
      this.peakConcurrentRequests = this.activeConcurrentRequests;
    }
  }

  decrementConcurrentRequests(): void {
    this.activeConcurrentRequests = Math.max(0, this.activeConcurrentRequests - 1);
  }

  getCacheHitRate(): number {
    const total = this.cacheHits + this.cacheMisses;
    return total > 0 ? this.cacheHits / total : 0;
  }

  // Format histogram for Prometheus
  private formatHistogram(name: string, histogram: HistogramData, help: string): string {
    const lines: string[] = [];
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} histogram`);

    // recordHistogram already counts every bucket a value fits in
    for (const bucket of LATENCY_BUCKETS) {
      lines.push(`${name}_bucket{le="${bucket}"} ${histogram.buckets.get(bucket) || 0}`);
    }
    lines.push(`${name}_bucket{le="+Inf"} ${histogram.count}`);
    lines.push(`${name}_sum ${histogram.sum}`);
    lines.push(`${name}_count ${histogram.count}`);

    return lines.join('\n');
  }

  private formatCounter(name: string, help: string, label: string, values: Map<string, number>): string {
    const lines: string[] = [];
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} counter`);
    for (const [key, count] of values) {
      lines.push(`${name}{${label}="${key.replace(/"/g, '\\"')}"} ${count}`);
    }
    if (values.size === 0) {
      lines.push(`${name} 0`);
    }
    return lines.join('\n');
  }

  // Generate Prometheus-compatible metrics output
  toPrometheus(): string {
    const sections: string[] = [];

    sections.push(this.formatHistogram(
      'race_metrics_compute_latency_ms',
      this.computeLatency,
      'Metric computation latency in milliseconds (cache misses only)'
    ));

    sections.push(this.formatHistogram(
      'race_metrics_request_latency_ms',
      this.totalRequestLatency,
      'Total request latency in milliseconds'
    ));

    sections.push([
      '# HELP race_metrics_cache_hits_total Total metric cache hits',
      '# TYPE race_metrics_cache_hits_total counter',
      `race_metrics_cache_hits_total ${this.cacheHits}`,
    ].join('\n'));

    sections.push([
      '# HELP race_metrics_cache_misses_total Total metric cache misses',
      '# TYPE race_metrics_cache_misses_total counter',
      `race_metrics_cache_misses_total ${this.cacheMisses}`,
    ].join('\n'));

    sections.push([
      '# HELP race_metrics_cache_hit_rate Metric cache hit rate (0-1)',
      '# TYPE race_metrics_cache_hit_rate gauge',
      `race_metrics_cache_hit_rate ${this.getCacheHitRate().toFixed(4)}`,
    ].join('\n'));

    sections.push([
      '# HELP race_metrics_cache_write_failures_total Cache writes that failed and were skipped',
      '# TYPE race_metrics_cache_write_failures_total counter',
      `race_metrics_cache_write_failures_total ${this.cacheWriteFailures}`,
    ].join('\n'));

    sections.push(this.formatCounter(
      'race_metrics_table_loads_total', 'Raw table loads by table', 'table', this.tableLoads
    ));

    sections.push(this.formatCounter(
      'race_metrics_requests_by_metric_total', 'Metric calculations requested by metric name', 'metric', this.requestsByMetric
    ));

    sections.push(this.formatCounter(
      'race_metrics_errors_total', 'Errors by type', 'type', this.errorsByType
    ));

    sections.push([
      '# HELP race_metrics_concurrent_requests Current concurrent requests',
      '# TYPE race_metrics_concurrent_requests gauge',
      `race_metrics_concurrent_requests ${this.activeConcurrentRequests}`,
      '# HELP race_metrics_peak_concurrent_requests Peak concurrent requests',
      '# TYPE race_metrics_peak_concurrent_requests gauge',
      `race_metrics_peak_concurrent_requests ${this.peakConcurrentRequests}`,
    ].join('\n'));

    return sections.join('\n\n') + '\n';
  }

  // Get summary for JSON endpoint
  toJSON(): Record<string, unknown> {
    return {
      compute: {
        count: this.computeLatency.count,
        sum_ms: this.computeLatency.sum,
        avg_ms: this.computeLatency.count > 0
          ? Math.round(this.computeLatency.sum / this.computeLatency.count)
          : 0,
      },
      requests: {
        count: this.totalRequestLatency.count,
        avg_ms: this.totalRequestLatency.count > 0
          ? Math.round(this.totalRequestLatency.sum / this.totalRequestLatency.count)
          : 0,
      },
      cache: {
        hits: this.cacheHits,
        misses: this.cacheMisses,
        hit_rate: this.getCacheHitRate(),
        write_failures: this.cacheWriteFailures,
      },
      table_loads: Object.fromEntries(this.tableLoads),
      requests_by_metric: Object.fromEntries(this.requestsByMetric),
      errors_by_type: Object.fromEntries(this.errorsByType),
      concurrency: {
        current: this.activeConcurrentRequests,
        peak: this.peakConcurrentRequests,
      },
    };
  }

  // Reset all metrics (for testing)
  reset(): void {
    this.computeLatency = this.createHistogram();
    this.totalRequestLatency = this.createHistogram();
    this.cacheHits = 0;
    this.cacheMisses = 0;
    this.cacheWriteFailures = 0;
    this.tableLoads.clear();
    this.requestsByMetric.clear();
    this.errorsByType.clear();
    this.activeConcurrentRequests = 0;
    this.peakConcurrentRequests = 0;
  }
}

// Singleton instance
export const serviceMetrics = new MetricsCollector();

/**
 * Create metrics router
 */
export function createMetricsRouter(): Router {
  const router = Router();

  // Prometheus-compatible metrics endpoint
  router.get('/metrics', (_req: Request, res: Response) => {
    res.set('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(serviceMetrics.toPrometheus());
  });

  // JSON metrics endpoint
  router.get('/metrics/json', (_req: Request, res: Response) => {
    res.json(serviceMetrics.toJSON());
  });

  return router;
}

/**
 * Middleware to track request metrics
 */
export function metricsMiddleware() {
  return (_req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    serviceMetrics.incrementConcurrentRequests();

    res.on('finish', () => {
      serviceMetrics.decrementConcurrentRequests();
      serviceMetrics.recordRequestLatency(Date.now() - startTime);
    });

    next();
  };
}
