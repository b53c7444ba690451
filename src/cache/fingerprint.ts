import * as crypto from 'crypto';
import { CACHE_SCHEMA_VERSION } from '../config/versioning';
import { MetricParams } from '../types/metrics';

export type CanonicalParams = { [key: string]: number | number[] | null };

/** Hex characters kept from the sha256 digest */
export const FINGERPRINT_LENGTH = 32;

/**
 * Canonical form of request parameters
 *
 * - keys sorted
 * - undefined dropped, explicit null kept (absent and null are different requests)
 * - race_ids de-duplicated and sorted (it is a set filter)
 */
export function canonicalParams(params: MetricParams): CanonicalParams {
  const canonical: CanonicalParams = {};
  const entries: Array<[string, number | number[] | null | undefined]> = [
    ['constructor_id', params.constructor_id],
    ['driver_id', params.driver_id],
    ['race_ids', params.race_ids ? [...new Set(params.race_ids)].sort((a, b) => a - b) : params.race_ids],
    ['season', params.season],
  ];

  for (const [key, value] of entries.sort(([a], [b]) => a.localeCompare(b))) {
    if (value !== undefined) {
      canonical[key] = value;
    }
  }

  return canonical;
}

/**
 * Data scope of a service: the season floor and the table source.
 * Results computed under one scope are never served under another.
 */
export function cacheScope(minYear: number, source: string): string {
  return `min_year=${minYear};source=${source}`;
}

/**
 * Deterministic cache key for (metric name, parameters, data scope)
 *
 * The cache schema version is part of the payload so a format change
 * invalidates every previous entry.
 */
export function computeFingerprint(metricName: string, params: MetricParams, scope = ''): string {
  const payload = {
    metric_name: metricName,
    parameters: canonicalParams(params),
    schema_version: CACHE_SCHEMA_VERSION,
    scope,
  };

  const json = JSON.stringify(payload);
  return crypto.createHash('sha256').update(json).digest('hex').slice(0, FINGERPRINT_LENGTH);
}
