import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RedisCacheStore } from '../../src/cache/redis-cache-store';
import { MetricCache } from '../../src/cache/metric-cache';

/**
 * Redis cache store tests (Redis is mocked)
 */

const client = vi.hoisted(() => ({
  connect: vi.fn(),
  quit: vi.fn(),
  get: vi.fn(),
  setEx: vi.fn(),
  del: vi.fn(),
  keys: vi.fn(),
  on: vi.fn(),
}));

vi.mock('redis', () => ({
  createClient: vi.fn(() => client),
}));

describe('RedisCacheStore', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    client.connect.mockResolvedValue(undefined);
    client.quit.mockResolvedValue(undefined);
    client.setEx.mockResolvedValue('OK');
    client.del.mockResolvedValue(1);
    client.keys.mockResolvedValue([]);
  });

  it('prefixes keys and sets the TTL on write', async () => {
    const store = new RedisCacheStore('redis://localhost:6379', 3600);
    await store.connect();

    await store.write('abc', '{"x":1}');
    expect(client.setEx).toHaveBeenCalledWith('metrics-cache:v1:abc', 3600, '{"x":1}');
  });

  it('reads and removes by fingerprint', async () => {
    const store = new RedisCacheStore('redis://localhost:6379', 60);
    await store.connect();

    client.get.mockResolvedValueOnce('{"x":1}');
    expect(await store.read('abc')).toBe('{"x":1}');
    expect(client.get).toHaveBeenCalledWith('metrics-cache:v1:abc');

    client.del.mockResolvedValueOnce(0);
    expect(await store.remove('abc')).toBe(false);
  });

  it('lists fingerprints without the prefix', async () => {
    const store = new RedisCacheStore('redis://localhost:6379', 60);
    await store.connect();

    client.keys.mockResolvedValueOnce(['metrics-cache:v1:bbb', 'metrics-cache:v1:aaa']);
    expect(await store.list()).toEqual(['aaa', 'bbb']);
    expect(client.keys).toHaveBeenCalledWith('metrics-cache:v1:*');
  });

  it('starts degraded when the connection fails', async () => {
    client.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    const store = new RedisCacheStore('redis://localhost:6379', 60);

    expect(await store.connect()).toBe(false);
    expect(store.isAvailable()).toBe(false);
    expect(store.describe()).toBe('redis (unavailable)');
    await expect(store.read('abc')).rejects.toThrow('Redis cache store is unavailable');
  });

  it('leaves the metric cache working as a miss while degraded', async () => {
    client.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    const store = new RedisCacheStore('redis://localhost:6379', 60);
    await store.connect();

    const cache = new MetricCache(store, { enabled: true, ttlSeconds: 60 });
    await cache.set('dnf_rate', { driver_id: 1 }, { metric_name: 'dnf_rate', value: 10 });

    expect(await cache.get('dnf_rate', { driver_id: 1 })).toBeNull();
    expect(client.setEx).not.toHaveBeenCalled();
  });

  it('quits the client on disconnect', async () => {
    const store = new RedisCacheStore('redis://localhost:6379', 60);
    await store.connect();
    expect(store.describe()).toBe('redis (connected)');

    await store.disconnect();
    expect(client.quit).toHaveBeenCalledTimes(1);
    expect(store.isAvailable()).toBe(false);
  });
});
