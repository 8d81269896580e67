/**
 * HTTP server entry point
 *
 *   POST /check                       price check a shopping list
 *   GET  /health, /status/*           liveness and resilience state
 *   GET  /price-history/:productKey   recorded prices
 *   /admin/*                          rate-limit blocks, cache control
 */

import { cfg } from '../config.js';
import { createServices } from './services.js';
import { createApp } from './app.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('server');

const CLIENT_CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

function start(): void {
  const services = createServices(cfg);
  const app = createApp(services);

  const cleanup = setInterval(() => {
    try {
      services.rateLimiter.cleanupExpiredClients();
      services.cache.sweepExpired();
    } catch (err) {
      log.error('Error in periodic cleanup', err);
    }
  }, CLIENT_CLEANUP_INTERVAL_MS);
  cleanup.unref();

  const server = app.listen(cfg.port, () => {
    log.info(`Grocery sale checker running on port ${cfg.port}`);
    log.info(`Health check: http://localhost:${cfg.port}/health`);
  });

  server.on('error', (err) => {
    log.error('Server error', err);
    process.exit(1);
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down...`);
    clearInterval(cleanup);
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

process.on('unhandledRejection', (reason) => {
  log.error('Unhandled Rejection', reason);
});

try {
  start();
} catch (err) {
  log.error('Failed to start', err);
  process.exit(1);
}
