/**
 * Value coercion for raw cells
 *
 * CSV sources hand over strings, postgres hands over numbers, strings or
 * null. Nullable coercions never throw: anything that is not a finite
 * number becomes null ("\N", "Ret", "DNF", "", "NA", ...).
 */

const NULL_SENTINELS = new Set(['', '\\N', 'NA', 'N/A', 'NULL', 'null', 'NaN']);

export function isNullSentinel(value: unknown): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  if (typeof value === 'string') {
    return NULL_SENTINELS.has(value.trim());
  }
  return false;
}

export function toNullableNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value !== 'string' || isNullSentinel(value)) {
    return null;
  }
  const trimmed = value.trim();
  // Number('') and Number(' ') are 0, and Number('0x10') is 16; only plain decimals count
  if (!/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toNullableInt(value: unknown): number | null {
  const parsed = toNullableNumber(value);
  return parsed !== null && Number.isInteger(parsed) ? parsed : null;
}

export function toNullableString(value: unknown): string | null {
  if (isNullSentinel(value)) {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}
