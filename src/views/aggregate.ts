/**
 * Small aggregation helpers shared by views and formulas
 */

export function groupBy<T, K>(rows: readonly T[], keyOf: (row: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const row of rows) {
    const key = keyOf(row);
    const group = groups.get(key);
    if (group) {
      group.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return groups;
}

/** Composite key for (race, team) style groupings */
export function pairKey(a: number, b: number): string {
  return `${a}:${b}`;
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}

export function mean(values: readonly number[]): number | null {
  return values.length > 0 ? sum(values) / values.length : null;
}

/**
 * Sample standard deviation (n - 1); null below two values
 */
export function sampleStd(values: readonly number[]): number | null {
  if (values.length < 2) {
    return null;
  }
  const avg = sum(values) / values.length;
  let squares = 0;
  for (const value of values) {
    squares += (value - avg) ** 2;
  }
  return Math.sqrt(squares / (values.length - 1));
}

/** Population standard deviation; null for an empty list */
export function populationStd(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const avg = sum(values) / values.length;
  let squares = 0;
  for (const value of values) {
    squares += (value - avg) ** 2;
  }
  return Math.sqrt(squares / values.length);
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

// loops rather than Math.min(...values): lap time columns exceed the argument limit
export function min(values: readonly number[]): number | null {
  let result: number | null = null;
  for (const value of values) {
    if (result === null || value < result) {
      result = value;
    }
  }
  return result;
}

export function max(values: readonly number[]): number | null {
  let result: number | null = null;
  for (const value of values) {
    if (result === null || value > result) {
      result = value;
    }
  }
  return result;
}

/**
 * Round half away from zero to a number of decimals
 */
export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const shifted = Math.abs(value) * factor;
  // absorb binary noise such as 1.005 * 100 = 100.49999999999999
  const rounded = Math.round(shifted + Number.EPSILON * shifted) / factor;
  return value < 0 ? -rounded : rounded;
}

/** Percentage of part over whole, 0 when whole is 0 */
export function percentage(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

export function countWhere<T>(rows: readonly T[], predicate: (row: T) => boolean): number {
  let count = 0;
  for (const row of rows) {
    if (predicate(row)) {
      count++;
    }
  }
  return count;
}

/** Non-null values of a column */
export function present<T>(rows: readonly T[], pick: (row: T) => number | null): number[] {
  const values: number[] = [];
  for (const row of rows) {
    const value = pick(row);
    if (value !== null) {
      values.push(value);
    }
  }
  return values;
}

export function unique<T>(values: readonly T[]): T[] {
  return [...new Set(values)];
}

/**
 * Quantile with linear interpolation between closest ranks; null for an empty list
 */
export function quantile(values: readonly number[], q: number): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

/**
 * Least-squares slope of values against their index (0, 1, 2, ...);
 * null below two values
 */
export function linearSlope(values: readonly number[]): number | null {
  if (values.length < 2) {
    return null;
  }
  const n = values.length;
  const meanX = (n - 1) / 2;
  const meanY = sum(values) / n;
  let numerator = 0;
  let denominator = 0;
  for (let i = 0; i < n; i++) {
    numerator += (i - meanX) * (values[i] - meanY);
    denominator += (i - meanX) ** 2;
  }
  return numerator / denominator;
}
