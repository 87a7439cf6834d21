/**
 * routes/health.ts — Health check endpoints
 *
 * GET /api/health         — Quick liveness check
 * GET /api/health/ready   — Readiness: dataset loadable + cache stats
 */
import { Router, type Request, type Response } from 'express';
import { env } from '../config/env.ts';
import { sourceLabel } from '../services/loader.ts';
import type { LotCache } from '../services/lot-cache.ts';
import type { LotSource } from '../types.ts';

export function createHealthRouter(cache: LotCache, source: LotSource): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      version: process.env.npm_package_version || '1.0.0',
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const checks: Record<string, { status: string; error?: string; details?: unknown }> = {};

    try {
      const lots = cache.get(source);
      checks.dataset = { status: 'ok', details: { lots: lots.length } };
    } catch (err) {
      checks.dataset = { status: 'error', error: err instanceof Error ? err.message : String(err) };
    }

    checks.cache = { status: 'ok', details: cache.stats() };

    const mem = process.memoryUsage();
    checks.memory = {
      status: 'ok',
      details: {
        heapUsedMB: Math.round(mem.heapUsed / 1024 / 1024),
        rssMB: Math.round(mem.rss / 1024 / 1024),
      },
    };

    const hasError = Object.values(checks).some(c => c.status === 'error');
    res.status(hasError ? 503 : 200).json({
      status: hasError ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      checks,
      config: { nodeEnv: env.NODE_ENV, source: sourceLabel(source) },
    });
  });

  return router;
}
