/**
 * Boundary validation for metric parameters and query strings
 *
 * Bodies arrive as untyped JSON; everything is narrowed here before it
 * reaches the registry or the view builder.
 */

import { InvalidParameterError } from '../errors/metric-errors';
import { MetricParams } from '../types/metrics';

export const MIN_SEASON = 1950;
export const MAX_SEASON = 2100;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Integers may arrive as JSON numbers or, from query strings, as digits */
function toInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    return parseInt(value, 10);
  }
  return null;
}

export function parsePositiveId(value: unknown, name: string): number {
  const parsed = toInteger(value);
  if (parsed === null || parsed <= 0) {
    throw new InvalidParameterError(name, `${name} must be a positive integer`);
  }
  return parsed;
}

export function parseSeason(value: unknown, name = 'season'): number {
  const parsed = toInteger(value);
  if (parsed === null || parsed < MIN_SEASON || parsed > MAX_SEASON) {
    throw new InvalidParameterError(name, `${name} must be a year between ${MIN_SEASON} and ${MAX_SEASON}`);
  }
  return parsed;
}

export function parseRaceIds(value: unknown): number[] {
  if (!Array.isArray(value)) {
    throw new InvalidParameterError('race_ids', 'race_ids must be an array of positive integers');
  }
  return value.map(id => parsePositiveId(id, 'race_ids'));
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null;
}

/**
 * Extract metric parameters from a request body.
 * Unknown keys are ignored; absent and null values are left out.
 */
export function parseMetricParams(body: unknown): MetricParams {
  if (isAbsent(body)) {
    return {};
  }
  if (!isRecord(body)) {
    throw new InvalidParameterError('body', 'Request body must be a JSON object');
  }

  const params: MetricParams = {};
  if (!isAbsent(body.driver_id)) {
    params.driver_id = parsePositiveId(body.driver_id, 'driver_id');
  }
  if (!isAbsent(body.constructor_id)) {
    params.constructor_id = parsePositiveId(body.constructor_id, 'constructor_id');
  }
  if (!isAbsent(body.season)) {
    params.season = parseSeason(body.season);
  }
  if (!isAbsent(body.race_ids)) {
    params.race_ids = parseRaceIds(body.race_ids);
  }
  return params;
}

export function parseMetricNames(body: unknown): string[] {
  const names = isRecord(body) ? body.metric_names : undefined;
  if (!Array.isArray(names) || names.length === 0) {
    throw new InvalidParameterError('metric_names', 'metric_names must be a non-empty array of strings');
  }

  const parsed: string[] = [];
  for (const name of names) {
    if (typeof name !== 'string' || name.trim().length === 0) {
      throw new InvalidParameterError('metric_names', 'metric_names must be a non-empty array of strings');
    }
    parsed.push(name.trim());
  }
  return parsed;
}

// ============================================================================
// QUERY STRINGS
// ============================================================================

/** Single string value of a query parameter; repeated keys are rejected */
function queryValue(query: Record<string, unknown>, name: string): string | undefined {
  const value = query[name];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new InvalidParameterError(name, `${name} must be given once`);
  }
  return value.trim().length > 0 ? value : undefined;
}

export function optionalSeasonQuery(query: Record<string, unknown>, name: string): number | null {
  const value = queryValue(query, name);
  return value === undefined ? null : parseSeason(value, name);
}

/**
 * start_year / end_year bounds of the driver and constructor lists
 */
export function yearRange(query: Record<string, unknown>): { startYear: number | null; endYear: number | null } {
  const startYear = optionalSeasonQuery(query, 'start_year');
  const endYear = optionalSeasonQuery(query, 'end_year');
  if (startYear !== null && endYear !== null && startYear > endYear) {
    throw new InvalidParameterError('start_year', 'start_year must not be after end_year');
  }
  return { startYear, endYear };
}

export function optionalLimitQuery(query: Record<string, unknown>, name = 'limit'): number | null {
  const value = queryValue(query, name);
  return value === undefined ? null : parsePositiveId(value, name);
}

export function booleanQuery(query: Record<string, unknown>, name: string): boolean {
  const value = queryValue(query, name);
  if (value === undefined) {
    return false;
  }
  const normalized = value.toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  throw new InvalidParameterError(name, `${name} must be true or false`);
}

export function optionalStringQuery(query: Record<string, unknown>, name: string): string | null {
  return queryValue(query, name) ?? null;
}
