// ============================================================
// Admin Routes — configuration, rules, exceptions, oversight
//
// All routes require requireAdminKey (pass-through when
// AUTH_REQUIRED=false).
// ============================================================

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { requireAdminKey } from '../auth/middleware.js';
import { WEEKDAYS } from '../domain/types.js';
import { serializeAppointment } from './appointment.routes.js';
import { AvailabilityQuerySchema, type EngineRouteOptions } from './availability.routes.js';
import { parseOrThrow } from './error-handler.js';

// Shape only; HH:mm ranges and ordering are checked by the rule service.
const RuleBodySchema = z.object({
  weekday: z.enum(WEEKDAYS),
  start_time: z.string(),
  end_time: z.string(),
  active: z.boolean().optional(),
  recurring: z.boolean().optional(),
}).strict();

const RulePatchSchema = RuleBodySchema.partial().strict();

const RuleListQuerySchema = z.object({
  weekday: z.enum(WEEKDAYS).optional(),
});

const IdParamsSchema = z.object({ id: z.string().min(1) });

const ExceptionBodySchema = z.object({
  date: z.string(),
  reason: z.string().max(500).optional(),
}).strict();

const ExceptionPatchSchema = z.object({
  reason: z.string().max(500).optional(),
  active: z.boolean().optional(),
}).strict();

const ExceptionListQuerySchema = z.object({
  start: z.string().optional(),
  end: z.string().optional(),
}).refine((q) => (q.start === undefined) === (q.end === undefined), {
  message: 'start and end must be given together',
});

const DateParamsSchema = z.object({ date: z.string() });

const AppointmentListQuerySchema = z.object({
  status: z.enum(['confirmed', 'cancelled']).optional(),
  subject_id: z.string().min(1).optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const ReferenceParamsSchema = z.object({ reference: z.string().min(1) });

export async function adminRoutes(app: FastifyInstance, opts: EngineRouteOptions): Promise<void> {
  const { engine } = opts;

  // ── Configuration ───────────────────────────────────────────

  app.get('/api/admin/configuration', { preHandler: requireAdminKey }, async () => {
    return engine.configuration.get();
  });

  app.patch('/api/admin/configuration', { preHandler: requireAdminKey }, async (req) => {
    return engine.configuration.update(req.body ?? {});
  });

  // ── Availability rules ──────────────────────────────────────

  app.get('/api/admin/rules', { preHandler: requireAdminKey }, async (req) => {
    const { weekday } = parseOrThrow(RuleListQuerySchema, req.query, 'rule filter');
    return { rules: await engine.rules.list(weekday) };
  });

  app.post('/api/admin/rules', { preHandler: requireAdminKey }, async (req, reply) => {
    const body = parseOrThrow(RuleBodySchema, req.body, 'availability rule');
    const rule = await engine.rules.add(body);
    return reply.code(201).send(rule);
  });

  app.patch('/api/admin/rules/:id', { preHandler: requireAdminKey }, async (req) => {
    const { id } = parseOrThrow(IdParamsSchema, req.params, 'rule id');
    const patch = parseOrThrow(RulePatchSchema, req.body ?? {}, 'availability rule update');
    return engine.rules.update(id, patch);
  });

  app.delete('/api/admin/rules/:id', { preHandler: requireAdminKey }, async (req, reply) => {
    const { id } = parseOrThrow(IdParamsSchema, req.params, 'rule id');
    await engine.rules.remove(id);
    return reply.code(204).send();
  });

  // ── Exception dates ─────────────────────────────────────────

  app.get('/api/admin/exceptions', { preHandler: requireAdminKey }, async (req) => {
    const { start, end } = parseOrThrow(ExceptionListQuerySchema, req.query, 'exception filter');
    const window = start !== undefined && end !== undefined ? { startDate: start, endDate: end } : undefined;
    return { exceptions: await engine.exceptions.list(window) };
  });

  app.post('/api/admin/exceptions', { preHandler: requireAdminKey }, async (req, reply) => {
    const body = parseOrThrow(ExceptionBodySchema, req.body, 'exception date');
    const created = await engine.exceptions.add(body.date, body.reason);
    return reply.code(201).send(created);
  });

  app.patch('/api/admin/exceptions/:date', { preHandler: requireAdminKey }, async (req) => {
    const { date } = parseOrThrow(DateParamsSchema, req.params, 'exception date');
    const patch = parseOrThrow(ExceptionPatchSchema, req.body ?? {}, 'exception update');
    return engine.exceptions.update(date, patch);
  });

  app.delete('/api/admin/exceptions/:date', { preHandler: requireAdminKey }, async (req, reply) => {
    const { date } = parseOrThrow(DateParamsSchema, req.params, 'exception date');
    await engine.exceptions.remove(date);
    return reply.code(204).send();
  });

  // ── Oversight ───────────────────────────────────────────────

  // Includes full slots, with capacity, so operators see load.
  app.get('/api/admin/availability', { preHandler: requireAdminKey }, async (req) => {
    const { start, end } = parseOrThrow(AvailabilityQuerySchema, req.query, 'availability query');
    const [config, slots] = await Promise.all([
      engine.configuration.get(),
      engine.scheduler.listAvailableSlots({ startDate: start, endDate: end }, { includeFull: true }),
    ]);
    return {
      timezone: config.timezone,
      slots: slots.map((slot) => ({
        start_at: slot.start_at.toISOString(),
        end_at: slot.end_at.toISOString(),
        capacity: slot.capacity,
        remaining_capacity: slot.remaining_capacity,
      })),
    };
  });

  app.get('/api/admin/appointments', { preHandler: requireAdminKey }, async (req) => {
    const q = parseOrThrow(AppointmentListQuerySchema, req.query, 'appointment filter');
    const appointments = await engine.ledger.list(q);
    return { appointments: appointments.map(serializeAppointment), limit: q.limit, offset: q.offset };
  });

  app.get('/api/admin/appointments/by-reference/:reference', { preHandler: requireAdminKey }, async (req) => {
    const { reference } = parseOrThrow(ReferenceParamsSchema, req.params, 'reference code');
    return serializeAppointment(await engine.ledger.findByReference(reference));
  });
}
