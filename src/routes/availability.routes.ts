import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { markPublic } from '../auth/middleware.js';
import type { Engine } from '../engine.js';
import { parseOrThrow } from './error-handler.js';

export interface EngineRouteOptions {
  engine: Engine;
}

const CalendarDateParam = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected yyyy-MM-dd');

export const AvailabilityQuerySchema = z.object({
  start: CalendarDateParam,
  end: CalendarDateParam,
});

export async function availabilityRoutes(app: FastifyInstance, opts: EngineRouteOptions): Promise<void> {
  const { engine } = opts;

  // GET /api/availability?start=yyyy-MM-dd&end=yyyy-MM-dd
  app.get('/api/availability', {
    preHandler: markPublic,
  }, async (req) => {
    const { start, end } = parseOrThrow(AvailabilityQuerySchema, req.query, 'availability query');

    const [config, slots] = await Promise.all([
      engine.configuration.get(),
      engine.scheduler.listAvailableSlots({ startDate: start, endDate: end }),
    ]);

    return {
      timezone: config.timezone,
      slots: slots.map((slot) => ({
        start_at: slot.start_at.toISOString(),
        end_at: slot.end_at.toISOString(),
        remaining_capacity: slot.remaining_capacity,
      })),
    };
  });
}
