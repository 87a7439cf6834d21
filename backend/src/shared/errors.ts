/**
 * shared/errors.ts — Typed failures surfaced to callers
 *
 *   LoadError             — dataset unreadable or not a JSON array (503)
 *   InvalidCriteriaError  — contradictory filter bounds (400)
 *
 * Per-record parse problems never raise; they degrade fields to null.
 */

export class LoadError extends Error {
  code = 'LOAD_FAILED' as const;
  status = 503;
  source: string;
  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LoadError';
    this.source = source;
  }
}

export class InvalidCriteriaError extends Error {
  code = 'INVALID_CRITERIA' as const;
  status = 400;
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCriteriaError';
  }
}
