import 'dotenv/config';
import { z } from 'zod';
import { isValidTimeZone } from '../utils/wall-clock.js';

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // ── Persistence ───────────────────────────────────────────
  // 'postgres' = tables from src/db/migrations (default)
  // 'memory'   = in-process stores; state is lost on restart
  STORE_MODE: z.enum(['postgres', 'memory']).default('postgres'),
  DATABASE_URL: z.string().optional().default(''),

  // ── Admin auth ────────────────────────────────────────────
  // When 'true', /api/admin/* requires X-Admin-Key or
  // Authorization: Bearer admin.<key>.
  AUTH_REQUIRED: z.enum(['true', 'false']).default('false'),
  ADMIN_API_KEY: z.string().optional().default(''),

  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  // ── Public booking routes rate limit (per client IP) ──────
  BOOKING_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(30),
  BOOKING_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),

  // Longest availability window a single query may ask for.
  MAX_WINDOW_DAYS: z.coerce.number().int().positive().default(62),

  // ── First-access configuration defaults ───────────────────
  // Only used when no configuration row exists yet.
  DEFAULT_SLOT_DURATION_MINUTES: z.coerce.number().int().positive().default(60),
  DEFAULT_MAX_APPOINTMENTS_PER_SLOT: z.coerce.number().int().min(1).default(1),
  DEFAULT_TIMEZONE: z.string().default('UTC').refine(isValidTimeZone, { message: 'Unknown IANA timezone' }),
  DEFAULT_MIN_BOOKING_LEAD_MINUTES: z.coerce.number().int().min(0).default(1440),
}).superRefine((data, ctx) => {
  if (data.STORE_MODE === 'postgres' && !data.DATABASE_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['DATABASE_URL'],
      message: 'DATABASE_URL is required when STORE_MODE=postgres. Use STORE_MODE=memory to run without a database.',
    });
  }

  if (data.AUTH_REQUIRED === 'true') {
    if (!data.ADMIN_API_KEY || data.ADMIN_API_KEY.length < 16) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ADMIN_API_KEY'],
        message: 'ADMIN_API_KEY must be at least 16 characters when AUTH_REQUIRED=true. Generate with: openssl rand -base64 24',
      });
    }
  }
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }
  return result.data;
}

export const env = loadEnv();
