// ============================================================
// Auth Middleware — Fastify preHandlers
//
// Two route tags:
//   - preHandler: [requireAdminKey]   — operator (/api/admin/*)
//   - preHandler: [markPublic]        — public (availability, bookings, health)
//
// When AUTH_REQUIRED=false (dev mode), requireAdminKey passes through.
// When AUTH_REQUIRED=true, a missing key is 401 and a wrong key 403.
//
// Default-deny: app.ts registers hooks that warn about untagged
// routes at startup and block their responses under enforcement.
// Public routes are also marked in their route config at
// registration; admin routes are only tagged once requireAdminKey
// has run.
// ============================================================

import { timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { env } from '../config/env.js';

declare module 'fastify' {
  interface FastifyRequest {
    /** Set by every auth preHandler; checked by the default-deny hook. */
    authTagged?: boolean;
    isAdmin?: boolean;
  }

  interface FastifyContextConfig {
    /**
     * Set at registration for routes guarded by markPublic, so
     * errors raised before preHandler (body parsing, rate limits)
     * still count as tagged.
     */
    publicRoute?: boolean;
  }
}

export function isAuthEnforced(): boolean {
  return env.AUTH_REQUIRED === 'true';
}

/**
 * Supported formats:
 *   - X-Admin-Key: <key>
 *   - Authorization: Bearer admin.<key>
 */
function extractAdminKey(request: FastifyRequest): string | null {
  const headerKey = request.headers['x-admin-key'];
  if (typeof headerKey === 'string' && headerKey.length > 0) {
    return headerKey;
  }

  const auth = request.headers.authorization;
  if (auth?.startsWith('Bearer admin.')) {
    return auth.slice('Bearer admin.'.length);
  }

  return null;
}

/**
 * Timing-safe comparison for admin key.
 */
function verifyAdminKey(provided: string): boolean {
  const expected = env.ADMIN_API_KEY;
  if (!expected) return false;

  const a = Buffer.from(provided, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  if (a.length !== b.length) {
    // Still compare so a length mismatch costs the same as a wrong key.
    const padded = Buffer.alloc(b.length);
    a.copy(padded, 0, 0, Math.min(a.length, b.length));
    timingSafeEqual(padded, b);
    return false;
  }
  return timingSafeEqual(a, b);
}

export async function requireAdminKey(
  request: FastifyRequest,
  reply: FastifyReply,
): Promise<FastifyReply | undefined> {
  request.authTagged = true;

  if (!isAuthEnforced()) return undefined;

  const key = extractAdminKey(request);
  if (!key) {
    return reply.code(401).send({
      error: 'UNAUTHORIZED',
      message: 'Admin API key required. Pass via X-Admin-Key header or Authorization: Bearer admin.<key>',
    });
  }

  if (!verifyAdminKey(key)) {
    return reply.code(403).send({ error: 'FORBIDDEN', message: 'Invalid admin API key.' });
  }

  request.isAdmin = true;
  return undefined;
}

/**
 * Tags the route as "auth checked" so the default-deny hook does
 * not reject it. No actual validation.
 */
export async function markPublic(
  request: FastifyRequest,
  _reply: FastifyReply,
): Promise<void> {
  request.authTagged = true;
}

/** preHandlers the default-deny route check accepts as an auth tag. */
export const AUTH_MIDDLEWARES: ReadonlySet<unknown> = new Set<unknown>([
  requireAdminKey,
  markPublic,
]);
