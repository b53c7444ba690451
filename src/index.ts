import 'dotenv/config';
import { createApp } from './api/app';
import { logError } from './api/middleware/production-safety';
import { getSettings } from './config/settings';
import { API_VERSION } from './config/versioning';
import { createServices } from './services';

/**
 * Race Metrics API - entry point
 *
 * - Tables loaded lazily from CSV or PostgreSQL
 * - Fingerprinted metric cache (file or Redis)
 * - Prometheus-compatible metrics
 * - Rate limiting, request timeout, graceful shutdown
 */
async function main() {
  const settings = getSettings();

  console.log('Service configuration:');
  console.log(`  Data source: ${settings.dataSource}`);
  console.log(`  Season floor: ${settings.minYear}`);
  console.log(`  Cache: ${settings.cacheEnabled ? settings.cacheBackend : 'disabled'} (TTL ${settings.cacheTtlSeconds}s)`);

  const services = await createServices(settings);
  const app = createApp(services);

  const server = app.listen(settings.port, () => {
    console.log(`\nRace Metrics API v${API_VERSION} listening on port ${settings.port}`);
    console.log(`\nEndpoints:`);
    console.log(`  GET  /api/v1            - API information`);
    console.log(`  GET  /api/v1/metrics/available`);
    console.log(`  POST /api/v1/metrics/:metric_name`);
    console.log(`  POST /api/v1/metrics/bulk`);
    console.log(`  GET  /health            - Health check`);
    console.log(`  GET  /metrics           - Prometheus metrics`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`\n${signal} received, shutting down gracefully...`);

    await new Promise<void>(resolve => server.close(() => resolve()));

    try {
      await services.close();
    } catch (err) {
      logError(err, { context: 'shutdown' });
    }

    console.log('Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logError(reason, { context: 'unhandled_rejection' });
  });
}

main().catch((err) => {
  console.error('Fatal error during startup:', err);
  process.exit(1);
});
