import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SlotFullError, SlotUnavailableError, ValidationError } from '../src/domain/errors.js';
import { overrideNow, resetClock } from '../src/services/clock.js';
import { createTestEngine, FROZEN_NOW, type TestEngine } from './helpers/engine-fixture.js';

const MONDAY = { startDate: '2026-03-02', endDate: '2026-03-02' };

describe('AppointmentScheduler', () => {
  let t: TestEngine;

  beforeEach(async () => {
    overrideNow(() => FROZEN_NOW);
    t = createTestEngine();
    await t.engine.rules.add({ weekday: 'monday', start_time: '09:00', end_time: '12:00' });
  });

  afterEach(() => {
    resetClock();
  });

  describe('listAvailableSlots', () => {
    it('returns every generated slot with full remaining capacity', async () => {
      const slots = await t.engine.scheduler.listAvailableSlots(MONDAY);
      expect(slots.map((s) => [s.start_at.toISOString(), s.remaining_capacity])).toEqual([
        ['2026-03-02T09:00:00.000Z', 2],
        ['2026-03-02T10:00:00.000Z', 2],
        ['2026-03-02T11:00:00.000Z', 2],
      ]);
    });

    it('is idempotent without intervening writes', async () => {
      const first = await t.engine.scheduler.listAvailableSlots(MONDAY);
      const second = await t.engine.scheduler.listAvailableSlots(MONDAY);
      expect(second).toEqual(first);
    });

    it('subtracts confirmed bookings and hides full slots', async () => {
      await t.engine.scheduler.requestBooking('2026-03-02T09:00:00Z', '2026-03-02T10:00:00Z', 'subject-1');
      await t.engine.scheduler.requestBooking('2026-03-02T09:00:00Z', '2026-03-02T10:00:00Z', 'subject-2');
      await t.engine.scheduler.requestBooking('2026-03-02T10:00:00Z', '2026-03-02T11:00:00Z', 'subject-3');

      const slots = await t.engine.scheduler.listAvailableSlots(MONDAY);
      expect(slots.map((s) => [s.start_at.toISOString(), s.remaining_capacity])).toEqual([
        ['2026-03-02T10:00:00.000Z', 1],
        ['2026-03-02T11:00:00.000Z', 2],
      ]);
    });

    it('keeps full slots for the admin view', async () => {
      await t.engine.scheduler.requestBooking('2026-03-02T09:00:00Z', '2026-03-02T10:00:00Z', 'subject-1');
      await t.engine.scheduler.requestBooking('2026-03-02T09:00:00Z', '2026-03-02T10:00:00Z', 'subject-2');

      const slots = await t.engine.scheduler.listAvailableSlots(MONDAY, { includeFull: true });
      expect(slots[0]).toMatchObject({ capacity: 2, remaining_capacity: 0 });
      expect(slots).toHaveLength(3);
    });

    it('returns a freed place after cancellation', async () => {
      const apt = await t.engine.scheduler.requestBooking('2026-03-02T09:00:00Z', '2026-03-02T10:00:00Z', 'subject-1');
      await t.engine.scheduler.cancelBooking(apt.id);

      const [nine] = await t.engine.scheduler.listAvailableSlots(MONDAY);
      expect(nine.remaining_capacity).toBe(2);
    });

    it('applies the lead time', async () => {
      overrideNow(() => new Date('2026-03-02T08:30:00.000Z'));
      const slots = await t.engine.scheduler.listAvailableSlots(MONDAY);
      expect(slots.map((s) => s.start_at.toISOString())).toEqual([
        '2026-03-02T10:00:00.000Z',
        '2026-03-02T11:00:00.000Z',
      ]);
    });

    it('reflects a configuration change on the next listing', async () => {
      await t.engine.configuration.update({ slot_duration_minutes: 90 });
      const slots = await t.engine.scheduler.listAvailableSlots(MONDAY);
      expect(slots.map((s) => [s.start_at.toISOString(), s.end_at.toISOString()])).toEqual([
        ['2026-03-02T09:00:00.000Z', '2026-03-02T10:30:00.000Z'],
        ['2026-03-02T10:30:00.000Z', '2026-03-02T12:00:00.000Z'],
      ]);
    });

    it('does not let bookings under an old slot length consume new slots', async () => {
      await t.engine.scheduler.requestBooking('2026-03-02T09:00:00Z', '2026-03-02T10:00:00Z', 'subject-1');
      await t.engine.configuration.update({ slot_duration_minutes: 90 });

      const [first] = await t.engine.scheduler.listAvailableSlots(MONDAY);
      expect(first.remaining_capacity).toBe(2);
    });

    it('rejects windows beyond the configured maximum', async () => {
      await expect(t.engine.scheduler.listAvailableSlots({ startDate: '2026-03-01', endDate: '2026-04-30' }))
        .rejects.toThrow(ValidationError);
    });
  });

  describe('requestBooking', () => {
    it('books from ISO strings', async () => {
      const apt = await t.engine.scheduler.requestBooking('2026-03-02T11:00:00Z', '2026-03-02T12:00:00Z', 'subject-1');
      expect(apt.slot_start.toISOString()).toBe('2026-03-02T11:00:00.000Z');
      expect(apt.status).toBe('confirmed');
    });

    it('accepts offsets equivalent to the slot instant', async () => {
      const apt = await t.engine.scheduler.requestBooking(
        '2026-03-02T10:00:00+01:00',
        '2026-03-02T11:00:00+01:00',
        'subject-1',
      );
      expect(apt.slot_start.toISOString()).toBe('2026-03-02T09:00:00.000Z');
    });

    it.each([
      ['not-a-date', '2026-03-02T10:00:00Z'],
      ['2026-03-02T10:00:00Z', '2026-03-02T09:00:00Z'],
      ['2026-03-02T09:00:00Z', '2026-03-02T09:00:00Z'],
      ['2026-03-02T09:00:00Z', '2026-03-02T09:30:00Z'],
      ['2026-03-02T09:00:00', '2026-03-02T10:00:00'],
      ['2026-03-02', '2026-03-02T10:00:00Z'],
    ])('rejects %s → %s as unavailable', async (start, end) => {
      await expect(t.engine.scheduler.requestBooking(start, end, 'subject-1')).rejects.toThrow(SlotUnavailableError);
    });

    it('rejects an empty subject id', async () => {
      await expect(t.engine.scheduler.requestBooking('2026-03-02T09:00:00Z', '2026-03-02T10:00:00Z', '  '))
        .rejects.toThrow(ValidationError);
    });

    it('surfaces SlotFullError from the ledger', async () => {
      await t.engine.scheduler.requestBooking('2026-03-02T09:00:00Z', '2026-03-02T10:00:00Z', 'subject-1');
      await t.engine.scheduler.requestBooking('2026-03-02T09:00:00Z', '2026-03-02T10:00:00Z', 'subject-2');
      await expect(t.engine.scheduler.requestBooking('2026-03-02T09:00:00Z', '2026-03-02T10:00:00Z', 'subject-3'))
        .rejects.toThrow(SlotFullError);
    });
  });
});
