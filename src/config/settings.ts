/**
 * Service Configuration
 * centralized config for data source, season floor, cache and http
 */

export type DataSourceKind = 'csv' | 'postgres';
export type CacheBackendKind = 'file' | 'redis';

export interface ServiceSettings {
  // http
  port: number;
  requestTimeoutMs: number;
  /** Requests per IP per 15 minutes on /api */
  rateLimitPerWindow: number;
  corsOrigins: string[];

  // data source
  dataSource: DataSourceKind;
  datasetDir: string;
  databaseUrl: string | null;

  // season floor applied to every race-derived view
  minYear: number;

  // metric cache
  cacheEnabled: boolean;
  cacheTtlSeconds: number;
  cacheBackend: CacheBackendKind;
  cacheDir: string;
  redisUrl: string;
}

/** Complete data availability starts with the 2011 season */
export const DEFAULT_MIN_YEAR = 2011;

/** One hour */
export const DEFAULT_CACHE_TTL_SECONDS = 3600;

function parseIntEnv(key: string, defaultValue: number): number {
  const val = process.env[key];
  if (!val) {
    return defaultValue;
  }
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseBoolEnv(key: string, defaultValue: boolean): boolean {
  const val = process.env[key];
  if (!val) {
    return defaultValue;
  }
  return val.toLowerCase() === 'true' || val === '1';
}

function parseStringEnv(key: string, defaultValue: string): string {
  const val = process.env[key];
  if (!val || val.trim().length === 0) {
    return defaultValue;
  }
  return val.trim();
}

/** Local frontends; CORS_ALLOWED_ORIGINS adds to these */
export const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://localhost:5173', 'http://localhost:8080'];

function parseListEnv(key: string): string[] {
  const val = process.env[key];
  if (!val) {
    return [];
  }
  return val.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

function parseDataSource(value: string): DataSourceKind {
  return value.toLowerCase() === 'postgres' ? 'postgres' : 'csv';
}

function parseCacheBackend(value: string): CacheBackendKind {
  return value.toLowerCase() === 'redis' ? 'redis' : 'file';
}

export function getSettings(): ServiceSettings {
  const databaseUrl = process.env.DATABASE_URL;

  return {
    port: parseIntEnv('PORT', 8000),
    requestTimeoutMs: parseIntEnv('REQUEST_TIMEOUT_MS', 15000),
    rateLimitPerWindow: parseIntEnv('RATE_LIMIT_PER_WINDOW', 300),
    corsOrigins: [...DEFAULT_CORS_ORIGINS, ...parseListEnv('CORS_ALLOWED_ORIGINS')],

    dataSource: parseDataSource(parseStringEnv('DATA_SOURCE', 'csv')),
    datasetDir: parseStringEnv('DATASET_DIR', 'dataset'),
    databaseUrl: databaseUrl && databaseUrl.trim().length > 0 ? databaseUrl : null,

    minYear: parseIntEnv('MIN_YEAR', DEFAULT_MIN_YEAR),

    cacheEnabled: parseBoolEnv('ENABLE_CACHE', true),
    cacheTtlSeconds: parseIntEnv('CACHE_TTL_SECONDS', DEFAULT_CACHE_TTL_SECONDS),
    cacheBackend: parseCacheBackend(parseStringEnv('CACHE_BACKEND', 'file')),
    cacheDir: parseStringEnv('CACHE_DIR', 'cache'),
    redisUrl: parseStringEnv('REDIS_URL', 'redis://localhost:6379'),
  };
}
