import type { FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import { z } from 'zod';
import { markPublic } from '../auth/middleware.js';
import { env } from '../config/env.js';
import { RateLimitedError } from '../domain/errors.js';
import type { Appointment } from '../domain/types.js';
import type { EngineRouteOptions } from './availability.routes.js';
import { parseOrThrow } from './error-handler.js';

const BookingBodySchema = z.object({
  slot_start: z.string().datetime({ offset: true }),
  slot_end: z.string().datetime({ offset: true }),
  subject_id: z.string().trim().min(1, 'subject_id must not be empty'),
});

const IdParamsSchema = z.object({ id: z.string().min(1) });

export function serializeAppointment(apt: Appointment) {
  return {
    appointment_id: apt.id,
    reference_code: apt.reference_code,
    status: apt.status,
    slot_start: apt.slot_start.toISOString(),
    slot_end: apt.slot_end.toISOString(),
    subject_id: apt.subject_id,
    created_at: apt.created_at.toISOString(),
    cancelled_at: apt.cancelled_at ? apt.cancelled_at.toISOString() : null,
  };
}

export async function appointmentRoutes(app: FastifyInstance, opts: EngineRouteOptions): Promise<void> {
  const { engine } = opts;

  // ── Rate limiting — scoped to this plugin (booking routes only) ──
  await app.register(rateLimit, {
    max: env.BOOKING_RATE_LIMIT_MAX,
    timeWindow: env.BOOKING_RATE_LIMIT_WINDOW_MS,
    keyGenerator: (req) => req.ip,
    onExceeded: (req) => {
      req.log.warn({ ip: req.ip, url: req.url }, 'Booking rate limit exceeded');
    },
    errorResponseBuilder: (_req, context) =>
      new RateLimitedError('Too many requests. Please try again later.', {
        retry_after_seconds: Math.ceil(context.ttl / 1000),
      }),
  });

  // POST /api/bookings — book a slot
  app.post('/api/bookings', {
    preHandler: markPublic,
  }, async (req, reply) => {
    const body = parseOrThrow(BookingBodySchema, req.body, 'booking request');
    const appointment = await engine.scheduler.requestBooking(body.slot_start, body.slot_end, body.subject_id);

    return reply.code(201).send({
      appointment_id: appointment.id,
      reference_code: appointment.reference_code,
      status: appointment.status,
      slot_start: appointment.slot_start.toISOString(),
      slot_end: appointment.slot_end.toISOString(),
    });
  });

  // GET /api/bookings/:id
  app.get('/api/bookings/:id', {
    preHandler: markPublic,
  }, async (req) => {
    const { id } = parseOrThrow(IdParamsSchema, req.params, 'appointment id');
    return serializeAppointment(await engine.ledger.get(id));
  });

  // POST /api/bookings/:id/cancel
  app.post('/api/bookings/:id/cancel', {
    preHandler: markPublic,
  }, async (req) => {
    const { id } = parseOrThrow(IdParamsSchema, req.params, 'appointment id');
    const cancelled = await engine.scheduler.cancelBooking(id);
    return { appointment_id: cancelled.id, status: cancelled.status };
  });
}
