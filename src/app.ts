// ============================================================
// HTTP App — Fastify instance with plugins, hooks and routes
//
// Built separately from index.ts so tests can drive it with
// app.inject() without listening on a port.
// ============================================================

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { env } from './config/env.js';
import { getCorsOptions } from './config/cors.js';
import { AUTH_MIDDLEWARES, isAuthEnforced, markPublic } from './auth/middleware.js';
import type { Engine } from './engine.js';
import { adminRoutes } from './routes/admin.routes.js';
import { appointmentRoutes } from './routes/appointment.routes.js';
import { availabilityRoutes } from './routes/availability.routes.js';
import { registerErrorHandler } from './routes/error-handler.js';

const PUBLIC_MIDDLEWARES: ReadonlySet<unknown> = new Set<unknown>([markPublic]);

export interface BuildAppOptions {
  engine: Engine;
  storeMode: string;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { engine } = options;
  const app = Fastify({ logger: options.logger ?? false });

  await app.register(cors, getCorsOptions());
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
  });

  registerErrorHandler(app);

  // ══ DEFAULT-DENY ═════════════════════════════════════════
  // Every route must carry requireAdminKey or markPublic. Untagged
  // routes are reported at registration and, under enforcement,
  // answered with 401 at runtime.
  app.addHook('onRoute', (routeOptions) => {
    if (routeOptions.url === '*') return;

    const preHandlers = Array.isArray(routeOptions.preHandler)
      ? routeOptions.preHandler
      : routeOptions.preHandler
        ? [routeOptions.preHandler]
        : [];

    if (preHandlers.some((h) => PUBLIC_MIDDLEWARES.has(h))) {
      routeOptions.config = { ...routeOptions.config, publicRoute: true };
    }

    if (!preHandlers.some((h) => AUTH_MIDDLEWARES.has(h))) {
      console.warn(
        `[auth] Route ${String(routeOptions.method)} ${routeOptions.url} has no auth preHandler; it will be blocked when AUTH_REQUIRED=true`,
      );
    }
  });

  app.addHook('onSend', async (request, reply, payload) => {
    if (request.authTagged || request.routeOptions.config.publicRoute) return payload;
    if (!isAuthEnforced()) return payload;

    // Also hides Fastify's own 404s from unauthenticated callers.
    reply.code(401);
    return JSON.stringify({
      error: 'UNAUTHORIZED',
      message: 'This endpoint requires authentication.',
    });
  });

  app.get('/health', { preHandler: markPublic }, async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    store: options.storeMode,
    environment: env.NODE_ENV,
  }));

  await app.register(availabilityRoutes, { engine });
  await app.register(appointmentRoutes, { engine });
  await app.register(adminRoutes, { engine });

  return app;
}
