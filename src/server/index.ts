/**
 * Pricewise — Server Entry
 *
 * Run with: npm run server
 */

import { config as loadEnv } from 'dotenv';
import { loadConfig } from '../lib/config';
import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { createApp } from './app';
import { createServices } from './services';

const CLEANUP_INTERVAL_MS = 60_000;

export function startServer(): void {
  loadEnv();
  const config = loadConfig();
  process.env.LOG_LEVEL = config.logLevel;

  const deps = createServices(config);
  const app = createApp(deps);

  // Periodic sweeps
  const cacheSweep = setInterval(() => {
    const removed = deps.cache.cleanupExpired();
    if (removed > 0) logger.debug('Expired cache entries removed', { removed });
  }, CLEANUP_INTERVAL_MS);
  cacheSweep.unref();

  const limiterSweep = setInterval(() => {
    const removed = deps.rateLimiter.cleanup();
    if (removed > 0) logger.debug('Idle rate-limit clients removed', { removed });
  }, CLEANUP_INTERVAL_MS);
  limiterSweep.unref();

  const server = app.listen(config.port, () => {
    logger.info('Pricewise API listening', {
      port: config.port,
      env: config.env,
      sites: deps.dispatcher.supportedSites().map(site => site.key),
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    clearInterval(cacheSweep);
    clearInterval(limiterSweep);
    server.close(error => {
      if (error) {
        logger.error('Error while closing server', { error: errorMessage(error) });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

// Start if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  try {
    startServer();
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}
