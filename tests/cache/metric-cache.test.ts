/**
 * METRIC CACHE TESTS
 *
 * Round trip, TTL expiry, corrupted entries and clearing, against the
 * memory store and the file store.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CacheStore, MemoryCacheStore } from '../../src/cache/cache-store';
import { FileCacheStore } from '../../src/cache/file-cache-store';
import { computeFingerprint } from '../../src/cache/fingerprint';
import { decodeEntry, MetricCache } from '../../src/cache/metric-cache';
import { CACHE_SCHEMA_VERSION } from '../../src/config/versioning';
import { MetricResult } from '../../src/types/metrics';

const TTL_SECONDS = 60;

function sampleResult(metricName: string, value: number): MetricResult {
  return {
    metric_name: metricName,
    value,
    driver_id: 1,
    driver_name: 'Ada Lane',
    metadata: { total_races: 3, breakdown: { wins: 1, seasons: [2020, 2021] }, note: null },
  };
}

class Clock {
  time = 1_700_000_000_000;
  now = () => this.time;
  advance(seconds: number) {
    this.time += seconds * 1000;
  }
}

/** Store whose every operation fails */
class BrokenStore implements CacheStore {
  readonly backend = 'memory';
  async read(): Promise<string | null> {
    throw new Error('disk unavailable');
  }
  async write(): Promise<void> {
    throw new Error('disk unavailable');
  }
  async remove(): Promise<boolean> {
    throw new Error('disk unavailable');
  }
  async list(): Promise<string[]> {
    throw new Error('disk unavailable');
  }
  describe(): string {
    return 'broken';
  }
}

describe('MetricCache', () => {
  let store: MemoryCacheStore;
  let clock: Clock;
  let cache: MetricCache;

  beforeEach(() => {
    store = new MemoryCacheStore();
    clock = new Clock();
    cache = new MetricCache(store, { enabled: true, ttlSeconds: TTL_SECONDS, now: clock.now });
  });

  it('returns what was stored for the same parameters', async () => {
    const result = sampleResult('dnf_rate', 33.33);
    await cache.set('dnf_rate', { driver_id: 1, season: 2020 }, result);

    expect(await cache.get('dnf_rate', { season: 2020, driver_id: 1 })).toEqual(result);
    expect(await cache.get('dnf_rate', { driver_id: 1, season: 2021 })).toBeNull();
  });

  it('stores the entry envelope under the fingerprint', async () => {
    const params = { driver_id: 1, race_ids: [11, 10] };
    await cache.set('dnf_rate', params, sampleResult('dnf_rate', 50));

    const fingerprint = computeFingerprint('dnf_rate', params);
    const raw = store.entries.get(fingerprint);
    expect(raw).toBeDefined();

    const decoded = decodeEntry(raw ?? '');
    expect(decoded.kind).toBe('valid');
    if (decoded.kind === 'valid') {
      expect(decoded.entry.version).toBe(CACHE_SCHEMA_VERSION);
      expect(decoded.entry.fingerprint).toBe(fingerprint);
      expect(decoded.entry.metric_name).toBe('dnf_rate');
      expect(decoded.entry.parameters).toEqual({ driver_id: 1, race_ids: [10, 11] });
      expect(decoded.entry.scope).toBe('');
      expect(decoded.entry.created_at).toBe(clock.time);
    }
  });

  it('expires entries after the TTL and removes them on read', async () => {
    await cache.set('dnf_rate', { driver_id: 1 }, sampleResult('dnf_rate', 10));

    clock.advance(TTL_SECONDS);
    expect(await cache.get('dnf_rate', { driver_id: 1 })).not.toBeNull();

    clock.advance(1);
    expect(await cache.get('dnf_rate', { driver_id: 1 })).toBeNull();
    expect(store.entries.size).toBe(0);
  });

  it('treats a corrupted entry as absent and discards it', async () => {
    const fingerprint = computeFingerprint('dnf_rate', { driver_id: 1 });
    store.entries.set(fingerprint, '{"version": "1", "result": ');

    expect(await cache.get('dnf_rate', { driver_id: 1 })).toBeNull();
    expect(store.entries.has(fingerprint)).toBe(false);
  });

  it('rejects a stored result that breaks the result schema', async () => {
    const fingerprint = computeFingerprint('dnf_rate', { driver_id: 1 });
    store.entries.set(
      fingerprint,
      JSON.stringify({
        version: CACHE_SCHEMA_VERSION,
        fingerprint,
        metric_name: 'dnf_rate',
        parameters: { driver_id: 1 },
        scope: '',
        created_at: clock.time,
        result: { metric_name: 'dnf_rate', value: 'fast' },
      })
    );

    expect(await cache.get('dnf_rate', { driver_id: 1 })).toBeNull();
  });

  it('misses on an entry written under another schema version', async () => {
    const fingerprint = computeFingerprint('dnf_rate', { driver_id: 1 });
    store.entries.set(
      fingerprint,
      JSON.stringify({
        version: '0',
        fingerprint,
        metric_name: 'dnf_rate',
        parameters: { driver_id: 1 },
        scope: '',
        created_at: clock.time,
        result: sampleResult('dnf_rate', 1),
      })
    );

    expect(await cache.get('dnf_rate', { driver_id: 1 })).toBeNull();
  });

  it('misses on an entry written under another data scope', async () => {
    const wide = new MetricCache(store, {
      enabled: true,
      ttlSeconds: TTL_SECONDS,
      scope: 'min_year=2011;source=memory',
      now: clock.now,
    });
    const narrow = new MetricCache(store, {
      enabled: true,
      ttlSeconds: TTL_SECONDS,
      scope: 'min_year=2021;source=memory',
      now: clock.now,
    });

    await wide.set('dnf_rate', { driver_id: 1 }, sampleResult('dnf_rate', 33.33));

    expect(await narrow.get('dnf_rate', { driver_id: 1 })).toBeNull();
    expect(await wide.get('dnf_rate', { driver_id: 1 })).not.toBeNull();
  });

  it('rejects a copied entry whose scope does not match', async () => {
    const scoped = new MetricCache(store, {
      enabled: true,
      ttlSeconds: TTL_SECONDS,
      scope: 'min_year=2021;source=memory',
      now: clock.now,
    });
    const fingerprint = computeFingerprint('dnf_rate', { driver_id: 1 }, 'min_year=2021;source=memory');
    store.entries.set(
      fingerprint,
      JSON.stringify({
        version: CACHE_SCHEMA_VERSION,
        fingerprint,
        metric_name: 'dnf_rate',
        parameters: { driver_id: 1 },
        scope: 'min_year=2011;source=memory',
        created_at: clock.time,
        result: sampleResult('dnf_rate', 1),
      })
    );

    expect(await scoped.get('dnf_rate', { driver_id: 1 })).toBeNull();
  });

  it('never throws when the store fails', async () => {
    const broken = new MetricCache(new BrokenStore(), { enabled: true, ttlSeconds: TTL_SECONDS });

    await expect(broken.set('dnf_rate', {}, sampleResult('dnf_rate', 1))).resolves.toBeUndefined();
    await expect(broken.get('dnf_rate', {})).resolves.toBeNull();
    await expect(broken.clear()).resolves.toBe(0);
    expect((await broken.stats()).total_entries).toBe(0);
  });

  it('clears every entry or only one metric', async () => {
    await cache.set('dnf_rate', { driver_id: 1 }, sampleResult('dnf_rate', 1));
    await cache.set('dnf_rate', { driver_id: 2 }, sampleResult('dnf_rate', 2));
    await cache.set('podium_rate', { driver_id: 1 }, sampleResult('podium_rate', 3));

    expect(await cache.clear('dnf_rate')).toBe(2);
    expect(await cache.get('podium_rate', { driver_id: 1 })).not.toBeNull();

    expect(await cache.clear()).toBe(1);
    expect(store.entries.size).toBe(0);
  });

  it('reports entries, bytes and expired entries', async () => {
    await cache.set('dnf_rate', { driver_id: 1 }, sampleResult('dnf_rate', 1));
    clock.advance(TTL_SECONDS + 1);
    await cache.set('dnf_rate', { driver_id: 2 }, sampleResult('dnf_rate', 2));

    const bytes = [...store.entries.values()].reduce((total, raw) => total + Buffer.byteLength(raw, 'utf-8'), 0);

    expect(await cache.stats()).toEqual({
      enabled: true,
      ttl_seconds: TTL_SECONDS,
      backend: 'memory',
      total_entries: 2,
      total_bytes: bytes,
      expired_entries: 1,
    });
  });

  it('does nothing when disabled', async () => {
    const disabled = new MetricCache(store, { enabled: false, ttlSeconds: TTL_SECONDS });

    await disabled.set('dnf_rate', {}, sampleResult('dnf_rate', 1));
    expect(store.entries.size).toBe(0);
    expect(await disabled.get('dnf_rate', {})).toBeNull();
  });
});

describe('FileCacheStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'race-metrics-cache-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes one JSON file per fingerprint and leaves no temporary files', async () => {
    const cacheDir = path.join(dir, 'nested');
    const store = new FileCacheStore(cacheDir);
    const cache = new MetricCache(store, { enabled: true, ttlSeconds: TTL_SECONDS });

    await cache.set('dnf_rate', { driver_id: 1 }, sampleResult('dnf_rate', 1));
    await cache.set('dnf_rate', { driver_id: 1 }, sampleResult('dnf_rate', 2));

    const fingerprint = computeFingerprint('dnf_rate', { driver_id: 1 });
    expect(fs.readdirSync(cacheDir)).toEqual([`${fingerprint}.json`]);
    expect((await cache.get('dnf_rate', { driver_id: 1 }))?.value).toBe(2);
  });

  it('reads a missing entry as absent', async () => {
    const store = new FileCacheStore(dir);
    expect(await store.read('0123456789abcdef0123456789abcdef')).toBeNull();
    expect(await store.remove('0123456789abcdef0123456789abcdef')).toBe(false);
  });

  it('lists stored fingerprints and ignores other files', async () => {
    const store = new FileCacheStore(dir);
    await store.write('bbbb', '{}');
    await store.write('aaaa', '{}');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'x');
    fs.writeFileSync(path.join(dir, '.cccc.tmp'), 'x');

    expect(await store.list()).toEqual(['aaaa', 'bbbb']);
    expect(await store.remove('aaaa')).toBe(true);
    expect(await store.list()).toEqual(['bbbb']);
  });

  it('lists nothing before the directory exists', async () => {
    const store = new FileCacheStore(path.join(dir, 'missing'));
    expect(await store.list()).toEqual([]);
  });
});
