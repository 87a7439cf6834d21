/**
 * shared/logger.ts — Structured logging via Pino
 *
 * Development: pino-pretty (colorized, human-readable)
 * Production:  JSON lines
 * Test:        silent unless LOG_LEVEL says otherwise
 */
import pino from 'pino';
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { env } from '../config/env.ts';

function defaultLevel(): string {
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export const logger = pino({
  level: env.LOG_LEVEL ?? defaultLevel(),
  transport: env.NODE_ENV === 'development'
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' } }
    : undefined,
  base: {
    service: 'lot-analytics-api',
    version: process.env.npm_package_version || '1.0.0',
    env: env.NODE_ENV,
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
});

declare module 'express-serve-static-core' {
  interface Request {
    id?: string;
    log?: pino.Logger;
  }
}

/**
 * Express middleware: logs every API request with duration and status.
 * Attaches a child logger to req.log for per-request context.
 */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();
    const header = req.headers['x-request-id'];
    const reqId = (typeof header === 'string' && header) || randomUUID().slice(0, 8);
    const log = logger.child({ reqId });

    req.id = reqId;
    req.log = log;
    res.setHeader('X-Request-Id', reqId);

    res.on('finish', () => {
      const duration = Date.now() - start;
      const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
      log[level]({
        req: { method: req.method, url: req.originalUrl, ip: req.ip },
        res: { statusCode: res.statusCode },
        duration,
      }, `${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms`);
    });

    next();
  };
}

/**
 * Create a child logger with additional context.
 * Usage: const log = childLogger({ module: 'loader' });
 */
export function childLogger(bindings: Record<string, unknown>): pino.Logger {
  return logger.child(bindings);
}
