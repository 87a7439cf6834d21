/**
 * config/env.ts — Zod-validated environment configuration
 * Fails fast at startup if a value is malformed.
 * Provides typed access to all config values.
 */
import { z } from 'zod';

const envSchema = z.object({
  // ── Server ──
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  API_BASE: z.string().startsWith('/').default('/api'),
  ALLOWED_ORIGINS: z.string().default('*'),

  // ── Dataset ──
  DATA_FILE: z.string().min(1).default('data/lots.json').describe('JSON array of auction lots'),

  // ── Rate Limiting ──
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(100),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60_000),

  // ── Logging ──
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('❌ Environment validation failed:');
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();
