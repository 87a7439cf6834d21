/**
 * server.ts — HTTP entry point
 *
 * Loads the dataset once at startup so the first request is served from
 * the cache; a failed load is logged and retried on the next request.
 */
import 'dotenv/config';
import { env } from './config/env.ts';
import { createApp } from './app.ts';
import { logger } from './shared/logger.ts';
import { LotCache } from './services/lot-cache.ts';
import type { LotSource } from './types.ts';

const BOOT_TIME = Date.now();

const source: LotSource = { path: env.DATA_FILE };
const cache = new LotCache();
const app = createApp({ source, cache });

const server = app.listen(env.PORT, () => {
  logger.info({ port: env.PORT, env: env.NODE_ENV, bootMs: Date.now() - BOOT_TIME }, 'Server started');
  try {
    const t0 = Date.now();
    const lots = cache.get(source);
    logger.info({ lots: lots.length, initMs: Date.now() - t0 }, 'Data ready');
  } catch (err) {
    logger.error({ err }, 'Data init failed');
  }
});

// ─── Graceful shutdown ───

function gracefulShutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down...');
  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });
  setTimeout(() => { logger.warn('Forced exit (10s timeout)'); process.exit(1); }, 10000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
});
process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  setTimeout(() => process.exit(1), 1000).unref();
});
