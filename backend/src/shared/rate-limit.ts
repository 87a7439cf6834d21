/**
 * shared/rate-limit.ts — Fixed-window per-IP limiter
 *
 * Slots whose window has passed are swept at most once per window, so the
 * table only holds clients seen in the last window or two.
 */
import type { Request, Response, NextFunction, RequestHandler } from 'express';

interface Slot {
  n: number;
  resetAt: number;
}

export class HitCounter {
  private slots = new Map<string, Slot>();
  private nextSweep: number;
  private readonly windowMs: number;

  constructor(windowMs: number, now = Date.now()) {
    this.windowMs = windowMs;
    this.nextSweep = now + windowMs;
  }

  /** Count one hit for a key and return its slot */
  hit(key: string, now = Date.now()): Readonly<Slot> {
    if (now >= this.nextSweep) this.sweep(now);
    let slot = this.slots.get(key);
    if (!slot || now >= slot.resetAt) {
      slot = { n: 0, resetAt: now + this.windowMs };
      this.slots.set(key, slot);
    }
    slot.n++;
    return slot;
  }

  get size(): number {
    return this.slots.size;
  }

  private sweep(now: number): void {
    for (const [key, slot] of this.slots) {
      if (now >= slot.resetAt) this.slots.delete(key);
    }
    this.nextSweep = now + this.windowMs;
  }
}

/** Limits GET requests; other methods pass through uncounted */
export function rateLimit(max: number, windowMs: number): RequestHandler {
  const counter = new HitCounter(windowMs);
  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.method !== 'GET') return next();
    const now = Date.now();
    const slot = counter.hit(req.ip || req.socket.remoteAddress || 'unknown', now);
    res.setHeader('X-RateLimit-Limit', String(max));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, max - slot.n)));
    if (slot.n > max) {
      res.status(429).json({ success: false, error: 'Rate limited', retryAfter: Math.ceil((slot.resetAt - now) / 1000) });
      return;
    }
    next();
  };
}
