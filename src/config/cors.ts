// ============================================================
// CORS Configuration — dynamic origin validation
//
// Development / test:
//   - All localhost / 127.0.0.1 origins are allowed
//   - Any origin in CORS_ORIGIN is allowed
//
// Production (NODE_ENV=production):
//   - Default-deny: only origins in CORS_ORIGIN pass
//   - Missing Origin header is allowed (server-to-server calls)
// ============================================================

import type { FastifyCorsOptions } from '@fastify/cors';
import { env } from './env.js';

export function isStrictCors(): boolean {
  return env.NODE_ENV === 'production';
}

function getAllowedOrigins(): string[] {
  const origins = env.CORS_ORIGIN.split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  return [...new Set(origins)];
}

/** localhost / 127.0.0.1 / [::1] on any port */
function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    return (
      url.hostname === 'localhost' ||
      url.hostname === '127.0.0.1' ||
      url.hostname === '[::1]' ||
      url.hostname === '::1'
    );
  } catch {
    return false;
  }
}

/**
 * @returns `true` if the origin is allowed. A missing origin is
 *          allowed: browsers always send Origin cross-origin.
 */
export function validateOrigin(origin: string | undefined): boolean {
  if (!origin) return true;

  if (getAllowedOrigins().includes(origin)) return true;
  if (!isStrictCors()) return isLocalhostOrigin(origin);
  return false;
}

/**
 * @fastify/cors `origin` callback.
 */
export function fastifyCorsOrigin(
  origin: string | undefined,
  callback: (err: Error | null, allow: boolean) => void,
): void {
  callback(null, validateOrigin(origin));
}

export function getCorsOptions(): FastifyCorsOptions {
  return {
    origin: fastifyCorsOrigin,
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
  };
}

export function logCorsPolicy(): void {
  if (isStrictCors()) {
    const origins = getAllowedOrigins();
    console.log(`[cors] STRICT mode: ${origins.length} allowed origin(s): ${origins.join(', ') || '(none)'}`);
    if (origins.length === 0) {
      console.warn('[cors] CORS_ORIGIN is empty; all cross-origin browser requests will be rejected.');
    }
  } else {
    console.log('[cors] DEV mode: localhost origins + CORS_ORIGIN allowed');
  }
}
