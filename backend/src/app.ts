/**
 * app.ts — Express application factory
 *
 * Built separately from server.ts so tests can mount the API on an
 * ephemeral port with their own dataset and cache.
 */
import express, { type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import compression from 'compression';
import { randomUUID } from 'crypto';
import { env } from './config/env.ts';
import { createLotsRouter } from './routes/lots.ts';
import { createHealthRouter } from './routes/health.ts';
import { logger, requestLogger } from './shared/logger.ts';
import { metricsMiddleware, metricsEndpoint } from './shared/metrics.ts';
import { rateLimit } from './shared/rate-limit.ts';
import { LoadError, InvalidCriteriaError } from './shared/errors.ts';
import { LotCache } from './services/lot-cache.ts';
import type { LotSource } from './types.ts';

export interface AppOptions {
  source: LotSource;
  cache?: LotCache;
  apiBase?: string;
  rateLimitMax?: number;
  rateLimitWindowMs?: number;
}

export function createApp(opts: AppOptions): express.Express {
  const cache = opts.cache ?? new LotCache();
  const apiBase = opts.apiBase ?? env.API_BASE;

  const app = express();
  app.set('trust proxy', 1);

  // ─── Security & Performance ───

  const origins = env.ALLOWED_ORIGINS.split(',').map(s => s.trim());
  app.use(cors({ origin: origins.includes('*') ? true : origins }));
  app.use(compression({ threshold: 1024 }));
  app.use(express.json({ limit: '10kb' }));

  app.use(metricsMiddleware());
  app.use(requestLogger());

  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    if (env.NODE_ENV === 'production') {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    next();
  });

  app.use(apiBase, rateLimit(opts.rateLimitMax ?? env.RATE_LIMIT_MAX, opts.rateLimitWindowMs ?? env.RATE_LIMIT_WINDOW_MS));

  // ─── API Routes ───

  app.get(`${apiBase}/metrics`, metricsEndpoint);
  app.use(`${apiBase}/health`, createHealthRouter(cache, opts.source));
  app.use(apiBase, createLotsRouter({ cache, source: opts.source }));

  app.use(apiBase, (_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  // ─── Error handling ───

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof InvalidCriteriaError) {
      res.status(err.status).json({ success: false, error: 'Invalid criteria', details: [err.message] });
      return;
    }
    if (err instanceof LoadError) {
      (req.log ?? logger).error({ err, source: err.source }, 'Dataset load failed');
      res.status(err.status).json({ success: false, error: 'Could not load data' });
      return;
    }
    const errId = req.id || randomUUID().slice(0, 8);
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ err, reqId: errId, method: req.method, url: req.url }, `Unhandled error [${errId}]`);
    res.status(500).json({
      success: false,
      error: env.NODE_ENV === 'production' ? 'Internal server error' : message,
      requestId: errId,
    });
  });

  return app;
}
