/**
 * REDIS CACHE STORE
 *
 * Metric cache entries in Redis, one key per fingerprint:
 *   metrics-cache:v1:<fingerprint>
 *
 * - Connection failures leave the store unavailable; every operation then
 *   throws and the MetricCache degrades to "absent"
 * - Operations are bounded by a timeout
 * - Keys carry a Redis TTL matching the cache TTL, so Redis evicts what
 *   the MetricCache would treat as expired anyway
 */

import { createClient } from 'redis';
import { CacheStore } from './cache-store';

type RedisClient = ReturnType<typeof createClient>;

const CONFIG = {
  KEY_PREFIX: 'metrics-cache:v1:',
  CONNECTION_TIMEOUT_MS: 5000,
  OPERATION_TIMEOUT_MS: 1000,
  MAX_RECONNECT_ATTEMPTS: 3,
};

export class RedisCacheStore implements CacheStore {
  readonly backend = 'redis';
  private client: RedisClient | null = null;
  private connected: boolean = false;

  constructor(
    private readonly url: string,
    private readonly ttlSeconds: number
  ) {}

  /**
   * Connect to Redis. Resolves false (degraded mode) instead of throwing.
   */
  async connect(): Promise<boolean> {
    if (this.connected && this.client) {
      return true;
    }

    try {
      const client = createClient({
        url: this.url,
        socket: {
          connectTimeout: CONFIG.CONNECTION_TIMEOUT_MS,
          reconnectStrategy: (retries: number) => {
            if (retries > CONFIG.MAX_RECONNECT_ATTEMPTS) {
              console.warn('[RedisCacheStore] Max reconnection attempts reached, operating in degraded mode');
              return false;
            }
            return Math.min(retries * 100, 3000);
          },
        },
      });

      client.on('error', (err: Error) => {
        console.error('[RedisCacheStore] Connection error:', err.message);
        this.connected = false;
      });

      client.on('connect', () => {
        console.log('[RedisCacheStore] Connected');
        this.connected = true;
      });

      this.client = client;
      await client.connect();
      this.connected = true;
      return true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[RedisCacheStore] Failed to connect: ${message}. Operating in degraded mode.`);
      this.connected = false;
      return false;
    }
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      const client = this.client;
      this.client = null;
      this.connected = false;
      await client.quit();
    }
  }

  isAvailable(): boolean {
    return this.connected && this.client !== null;
  }

  async read(fingerprint: string): Promise<string | null> {
    const client = this.requireClient();
    return this.withTimeout(client.get(this.key(fingerprint)));
  }

  async write(fingerprint: string, content: string): Promise<void> {
    const client = this.requireClient();
    await this.withTimeout(client.setEx(this.key(fingerprint), Math.max(1, this.ttlSeconds), content));
  }

  async remove(fingerprint: string): Promise<boolean> {
    const client = this.requireClient();
    const deleted = await this.withTimeout(client.del(this.key(fingerprint)));
    return deleted > 0;
  }

  async list(): Promise<string[]> {
    const client = this.requireClient();
    const keys = await this.withTimeout(client.keys(`${CONFIG.KEY_PREFIX}*`));
    return keys.map(key => key.slice(CONFIG.KEY_PREFIX.length)).sort();
  }

  describe(): string {
    return `redis (${this.isAvailable() ? 'connected' : 'unavailable'})`;
  }

  private key(fingerprint: string): string {
    return `${CONFIG.KEY_PREFIX}${fingerprint}`;
  }

  private requireClient(): RedisClient {
    if (!this.client || !this.connected) {
      throw new Error('Redis cache store is unavailable');
    }
    return this.client;
  }

  private withTimeout<T>(operation: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error('Redis operation timeout')), CONFIG.OPERATION_TIMEOUT_MS);
    });

    return Promise.race([operation, timeout]).finally(() => clearTimeout(timer));
  }
}
