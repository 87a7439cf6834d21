/**
 * shared/metrics.ts — Prometheus metrics via prom-client
 *
 * Exposes: /api/metrics
 *
 * Metrics:
 *   lots_http_requests_total           — Counter by method/route/status
 *   lots_http_request_duration_seconds — Histogram by method/route/status
 *   lots_cache_operations_total        — Counter by operation (hit/miss/invalidate)
 *   lots_load_duration_seconds         — Histogram for dataset loads
 *   lots_dataset_size                  — Gauge for loaded / degraded record counts
 */
import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import type { Request, Response, NextFunction } from 'express';

export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: 'lots_' });

// ── HTTP Metrics ──

export const httpRequestsTotal = new Counter({
  name: 'lots_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'lots_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [registry],
});

// ── Cache Metrics ──

export const cacheOperations = new Counter({
  name: 'lots_cache_operations_total',
  help: 'Dataset cache operations by type',
  labelNames: ['operation'] as const, // hit, miss, invalidate
  registers: [registry],
});

// ── Load Metrics ──

export const loadDuration = new Histogram({
  name: 'lots_load_duration_seconds',
  help: 'Dataset read + normalize duration in seconds',
  labelNames: ['status'] as const,
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [registry],
});

export const datasetSize = new Gauge({
  name: 'lots_dataset_size',
  help: 'Records in the most recently loaded dataset',
  labelNames: ['kind'] as const, // lots, degraded_fields
  registers: [registry],
});

// ── Express Middleware ──

/** Route label without query string (path params are not used by this API) */
function normalizeRoute(req: Request): string {
  const url = req.originalUrl || req.url;
  return url.split('?')[0] ?? url;
}

/**
 * Metrics collection middleware. Place early in the middleware chain.
 */
export function metricsMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.url.endsWith('/metrics')) return next();

    const end = httpRequestDuration.startTimer();
    res.on('finish', () => {
      const labels = { method: req.method, route: normalizeRoute(req), status_code: String(res.statusCode) };
      end(labels);
      httpRequestsTotal.inc(labels);
    });

    next();
  };
}

/**
 * Metrics endpoint handler. Returns Prometheus text format.
 */
export async function metricsEndpoint(_req: Request, res: Response): Promise<void> {
  try {
    res.set('Content-Type', registry.contentType);
    res.end(await registry.metrics());
  } catch {
    res.status(500).end('Error collecting metrics');
  }
}
