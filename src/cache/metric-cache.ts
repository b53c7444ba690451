/**
 * Metric Cache
 *
 * Content-addressed store of computed metric results:
 *   fingerprint(metric name, parameters, data scope) -> CacheEntry
 *
 * Entries expire `ttlSeconds` after creation; an expired entry is deleted
 * when it is read. The cache never throws: read faults are misses, write
 * and clear faults are logged and skipped.
 */

import { CACHE_SCHEMA_VERSION } from '../config/versioning';
import { errorMessage } from '../errors/metric-errors';
import { isMetricResult } from '../metrics/result';
import { serviceMetrics } from '../observability/metrics';
import { MetricParams, MetricResult } from '../types/metrics';
import { CacheBackend, CacheStore } from './cache-store';
import { canonicalParams, CanonicalParams, computeFingerprint } from './fingerprint';

export interface CacheEntry {
  version: string;
  fingerprint: string;
  metric_name: string;
  parameters: CanonicalParams;
  /** season floor and table source the result was computed under */
  scope: string;
  /** epoch milliseconds */
  created_at: number;
  result: MetricResult;
}

export interface CacheStats {
  enabled: boolean;
  ttl_seconds: number;
  backend: CacheBackend;
  total_entries: number;
  total_bytes: number;
  expired_entries: number;
}

export interface MetricCacheOptions {
  enabled: boolean;
  ttlSeconds: number;
  /** Data scope, see cacheScope() */
  scope?: string;
  /** Clock, injectable for TTL tests */
  now?: () => number;
}

type DecodedEntry =
  | { kind: 'valid'; entry: CacheEntry }
  | { kind: 'corrupted'; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCanonicalParams(value: unknown): value is CanonicalParams {
  if (!isRecord(value)) {
    return false;
  }
  return Object.values(value).every(v =>
    v === null ||
    typeof v === 'number' ||
    (Array.isArray(v) && v.every(item => typeof item === 'number'))
  );
}

/**
 * Parse and validate a stored entry
 */
export function decodeEntry(raw: string): DecodedEntry {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { kind: 'corrupted', reason: `invalid JSON: ${errorMessage(err)}` };
  }

  if (!isRecord(parsed)) {
    return { kind: 'corrupted', reason: 'entry is not an object' };
  }

  const { version, fingerprint, metric_name, parameters, scope, created_at, result } = parsed;
  if (
    typeof version !== 'string' ||
    typeof fingerprint !== 'string' ||
    typeof metric_name !== 'string' ||
    typeof scope !== 'string' ||
    typeof created_at !== 'number' ||
    !Number.isFinite(created_at) ||
    !isCanonicalParams(parameters)
  ) {
    return { kind: 'corrupted', reason: 'entry envelope is invalid' };
  }

  if (!isMetricResult(result)) {
    return { kind: 'corrupted', reason: 'stored result does not match the result schema' };
  }

  return {
    kind: 'valid',
    entry: { version, fingerprint, metric_name, parameters, scope, created_at, result },
  };
}

export class MetricCache {
  readonly enabled: boolean;
  readonly ttlSeconds: number;
  readonly scope: string;
  private readonly now: () => number;

  constructor(private readonly store: CacheStore, options: MetricCacheOptions) {
    this.enabled = options.enabled;
    this.ttlSeconds = options.ttlSeconds;
    this.scope = options.scope ?? '';
    this.now = options.now ?? Date.now;
  }

  get backend(): CacheBackend {
    return this.store.backend;
  }

  /**
   * Cached result, or null on miss / expiry / corruption / disabled cache
   */
  async get(metricName: string, params: MetricParams): Promise<MetricResult | null> {
    if (!this.enabled) {
      return null;
    }

    const fingerprint = computeFingerprint(metricName, params, this.scope);

    try {
      const raw = await this.store.read(fingerprint);
      if (raw === null) {
        serviceMetrics.incrementCacheMiss();
        return null;
      }

      const decoded = decodeEntry(raw);
      if (decoded.kind === 'corrupted') {
        console.warn(`[MetricCache] Corrupted entry ${fingerprint} (${metricName}): ${decoded.reason}`);
        serviceMetrics.incrementCacheMiss();
        await this.discard(fingerprint);
        return null;
      }

      const { entry } = decoded;
      if (
        entry.version !== CACHE_SCHEMA_VERSION ||
        entry.metric_name !== metricName ||
        entry.scope !== this.scope
      ) {
        serviceMetrics.incrementCacheMiss();
        return null;
      }

      if (this.isExpired(entry)) {
        serviceMetrics.incrementCacheMiss();
        await this.discard(fingerprint);
        return null;
      }

      serviceMetrics.incrementCacheHit();
      return entry.result;
    } catch (err) {
      console.warn(`[MetricCache] Read failed for ${metricName} (${fingerprint}): ${errorMessage(err)}`);
      serviceMetrics.incrementCacheMiss();
      return null;
    }
  }

  /**
   * Store a result, overwriting any entry for the same fingerprint
   */
  async set(metricName: string, params: MetricParams, result: MetricResult): Promise<void> {
    if (!this.enabled) {
      return;
    }

    const fingerprint = computeFingerprint(metricName, params, this.scope);

    try {
      if (!isMetricResult(result)) {
        throw new Error('result does not match the result schema');
      }

      const entry: CacheEntry = {
        version: CACHE_SCHEMA_VERSION,
        fingerprint,
        metric_name: metricName,
        parameters: canonicalParams(params),
        scope: this.scope,
        created_at: this.now(),
        result,
      };

      await this.store.write(fingerprint, JSON.stringify(entry));
    } catch (err) {
      console.error(`[MetricCache] Write failed for ${metricName} (${fingerprint}): ${errorMessage(err)}`);
      serviceMetrics.incrementCacheWriteFailure();
    }
  }

  /**
   * Delete every entry, or only those of one metric (reads each entry).
   * Returns the number of deleted entries.
   */
  async clear(metricName?: string): Promise<number> {
    let cleared = 0;

    try {
      const fingerprints = await this.store.list();

      for (const fingerprint of fingerprints) {
        if (metricName !== undefined && !(await this.belongsTo(fingerprint, metricName))) {
          continue;
        }
        if (await this.store.remove(fingerprint)) {
          cleared++;
        }
      }
    } catch (err) {
      console.error(`[MetricCache] Clear failed: ${errorMessage(err)}`);
    }

    console.log(`[MetricCache] Cleared ${cleared} entries${metricName ? ` for ${metricName}` : ''}`);
    return cleared;
  }

  /**
   * Point-in-time snapshot; entries may change while it is taken
   */
  async stats(): Promise<CacheStats> {
    const stats: CacheStats = {
      enabled: this.enabled,
      ttl_seconds: this.ttlSeconds,
      backend: this.store.backend,
      total_entries: 0,
      total_bytes: 0,
      expired_entries: 0,
    };

    try {
      const fingerprints = await this.store.list();

      for (const fingerprint of fingerprints) {
        const raw = await this.store.read(fingerprint);
        if (raw === null) {
          continue;
        }
        stats.total_entries++;
        stats.total_bytes += Buffer.byteLength(raw, 'utf-8');

        const decoded = decodeEntry(raw);
        if (decoded.kind === 'valid' && this.isExpired(decoded.entry)) {
          stats.expired_entries++;
        }
      }
    } catch (err) {
      console.error(`[MetricCache] Stats failed: ${errorMessage(err)}`);
    }

    return stats;
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.created_at > this.ttlSeconds * 1000;
  }

  private async belongsTo(fingerprint: string, metricName: string): Promise<boolean> {
    try {
      const raw = await this.store.read(fingerprint);
      if (raw === null) {
        return false;
      }
      const decoded = decodeEntry(raw);
      return decoded.kind === 'valid' && decoded.entry.metric_name === metricName;
    } catch (err) {
      console.warn(`[MetricCache] Skipping unreadable entry ${fingerprint}: ${errorMessage(err)}`);
      return false;
    }
  }

  private async discard(fingerprint: string): Promise<void> {
    try {
      await this.store.remove(fingerprint);
    } catch (err) {
      console.warn(`[MetricCache] Could not remove entry ${fingerprint}: ${errorMessage(err)}`);
    }
  }
}
