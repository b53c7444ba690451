import { Pool } from 'pg';
import { CacheStore } from './cache/cache-store';
import { FileCacheStore } from './cache/file-cache-store';
import { cacheScope } from './cache/fingerprint';
import { MetricCache } from './cache/metric-cache';
import { RedisCacheStore } from './cache/redis-cache-store';
import { ServiceSettings } from './config/settings';
import { PostgresTableSource } from './data/pg-table-source';
import { CsvTableSource, TableSource } from './data/table-source';
import { TableStore } from './data/table-store';
import { createReadOnlyPool, getConnectionInfo } from './db/pool';
import { MetricRegistry } from './metrics/registry';
import { ViewBuilder } from './views/view-builder';

/**
 * Everything a request handler needs, built once at startup.
 * Nothing here is a module-level singleton; tests build their own.
 */
export interface Services {
  settings: ServiceSettings;
  tables: TableStore;
  views: ViewBuilder;
  cache: MetricCache;
  registry: MetricRegistry;
  /** Release pools and connections */
  close(): Promise<void>;
}

export interface ServiceParts {
  source: TableSource;
  cacheStore: CacheStore;
  now?: () => number;
  close?: () => Promise<void>;
}

export function buildServices(settings: ServiceSettings, parts: ServiceParts): Services {
  const tables = new TableStore(parts.source);
  const views = new ViewBuilder(tables, settings.minYear);
  const cache = new MetricCache(parts.cacheStore, {
    enabled: settings.cacheEnabled,
    ttlSeconds: settings.cacheTtlSeconds,
    scope: cacheScope(settings.minYear, tables.describeSource()),
    now: parts.now,
  });
  const registry = new MetricRegistry(views, cache);

  return {
    settings,
    tables,
    views,
    cache,
    registry,
    close: parts.close ?? (async () => undefined),
  };
}

/**
 * Wire the configured table source and cache backend
 */
export async function createServices(settings: ServiceSettings): Promise<Services> {
  let pool: Pool | null = null;
  let source: TableSource;

  if (settings.dataSource === 'postgres') {
    if (!settings.databaseUrl) {
      throw new Error('DATA_SOURCE=postgres requires DATABASE_URL');
    }
    const info = getConnectionInfo(settings.databaseUrl);
    console.log(`[Services] Table source: postgres at ${info.host} (SSL: ${info.ssl ? 'enabled' : 'disabled'})`);
    pool = createReadOnlyPool(settings.databaseUrl);
    source = new PostgresTableSource(pool);
  } else {
    console.log(`[Services] Table source: csv in ${settings.datasetDir}`);
    source = new CsvTableSource(settings.datasetDir);
  }

  let redis: RedisCacheStore | null = null;
  let cacheStore: CacheStore;

  if (settings.cacheBackend === 'redis') {
    redis = new RedisCacheStore(settings.redisUrl, settings.cacheTtlSeconds);
    if (settings.cacheEnabled && !(await redis.connect())) {
      console.warn('[Services] Redis cache unavailable - results will be computed on every request');
    }
    cacheStore = redis;
  } else {
    cacheStore = new FileCacheStore(settings.cacheDir);
  }
  console.log(`[Services] Metric cache: ${cacheStore.describe()} (${settings.cacheEnabled ? 'enabled' : 'disabled'})`);

  const redisStore = redis;
  const pgPool = pool;

  return buildServices(settings, {
    source,
    cacheStore,
    close: async () => {
      if (redisStore) {
        await redisStore.disconnect();
      }
      if (pgPool) {
        await pgPool.end();
      }
    },
  });
}
