import { describe, it, expect } from 'vitest';
import { cacheScope, canonicalParams, computeFingerprint, FINGERPRINT_LENGTH } from '../../src/cache/fingerprint';

describe('Fingerprint', () => {
  it('is a fixed-length hex string', () => {
    const fingerprint = computeFingerprint('dnf_rate', { driver_id: 1 });
    expect(fingerprint).toMatch(new RegExp(`^[0-9a-f]{${FINGERPRINT_LENGTH}}$`));
  });

  it('does not depend on key order', () => {
    const a = computeFingerprint('constructor_win_rate', { constructor_id: 1, season: 2020 });
    const b = computeFingerprint('constructor_win_rate', { season: 2020, constructor_id: 1 });
    expect(a).toBe(b);
  });

  it('treats race_ids as a set', () => {
    const a = computeFingerprint('points_per_race', { race_ids: [12, 10, 11] });
    const b = computeFingerprint('points_per_race', { race_ids: [10, 11, 12, 10] });
    expect(a).toBe(b);
  });

  it('changes with the metric name and every parameter', () => {
    const base = computeFingerprint('dnf_rate', { driver_id: 1, season: 2020 });

    expect(computeFingerprint('podium_rate', { driver_id: 1, season: 2020 })).not.toBe(base);
    expect(computeFingerprint('dnf_rate', { driver_id: 2, season: 2020 })).not.toBe(base);
    expect(computeFingerprint('dnf_rate', { driver_id: 1, season: 2021 })).not.toBe(base);
    expect(computeFingerprint('dnf_rate', { driver_id: 1, season: 2020, race_ids: [10] })).not.toBe(base);
  });

  it('changes with the season floor and the table source', () => {
    const params = { driver_id: 1 };
    const base = computeFingerprint('dnf_rate', params, cacheScope(2011, 'csv:dataset'));

    expect(cacheScope(2011, 'csv:dataset')).toBe('min_year=2011;source=csv:dataset');
    expect(computeFingerprint('dnf_rate', params, cacheScope(2011, 'csv:dataset'))).toBe(base);
    expect(computeFingerprint('dnf_rate', params, cacheScope(2021, 'csv:dataset'))).not.toBe(base);
    expect(computeFingerprint('dnf_rate', params, cacheScope(2011, 'postgres:public'))).not.toBe(base);
  });

  it('ignores undefined but keeps an explicit null', () => {
    const absent = computeFingerprint('dnf_rate', { driver_id: 1 });

    expect(computeFingerprint('dnf_rate', { driver_id: 1, season: undefined })).toBe(absent);
    expect(computeFingerprint('dnf_rate', { driver_id: 1, season: null })).not.toBe(absent);
  });

  it('builds the canonical parameter object', () => {
    expect(canonicalParams({ season: 2020, race_ids: [3, 1, 3], driver_id: 7, constructor_id: undefined })).toEqual({
      driver_id: 7,
      race_ids: [1, 3],
      season: 2020,
    });
    expect(Object.keys(canonicalParams({ season: 2020, driver_id: 7, constructor_id: 2 }))).toEqual([
      'constructor_id',
      'driver_id',
      'season',
    ]);
  });
});
