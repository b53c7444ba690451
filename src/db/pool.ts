import { Pool, PoolConfig } from 'pg';

/**
 * Parse database URL to extract host for logging (no secrets)
 */
function parseDbHost(connectionString: string): string {
  try {
    const url = new URL(connectionString);
    return url.hostname;
  } catch {
    return 'unknown';
  }
}

function requiresSSL(connectionString: string): boolean {
  return connectionString.includes('sslmode=require');
}

/**
 * Get connection info for logging (no secrets exposed)
 */
export function getConnectionInfo(connectionString: string): { host: string; ssl: boolean } {
  return {
    host: parseDbHost(connectionString),
    ssl: requiresSSL(connectionString)
  };
}

/**
 * Create PostgreSQL connection pool (READ-ONLY)
 *
 * The race tables are never written by this service.
 */
export function createReadOnlyPool(connectionString: string, config?: PoolConfig): Pool {
  const useSSL = requiresSSL(connectionString);

  const poolConfig: PoolConfig = config || {
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    // Longer timeout for external databases
    connectionTimeoutMillis: useSSL ? 10000 : 5000,
    ssl: useSSL ? { rejectUnauthorized: false } : undefined,
  };

  const pool = new Pool(poolConfig);

  // Set READ-ONLY mode for all connections
  pool.on('connect', (client) => {
    client.query('SET SESSION CHARACTERISTICS AS TRANSACTION READ ONLY').catch((err: unknown) => {
      console.error('[DB] Failed to set READ ONLY mode:', err);
    });
  });

  pool.on('error', (err) => {
    console.error('[DB] Unexpected database error:', err);
  });

  return pool;
}
