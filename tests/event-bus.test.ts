import { describe, it, expect, vi, afterEach } from 'vitest';
import type { BookingConfirmedEvent } from '../src/domain/events.js';
import type { AuditSink } from '../src/domain/interfaces.js';
import type { Appointment } from '../src/domain/types.js';
import { DomainEventBus } from '../src/orchestrator/event-bus.js';
import { InMemoryAuditLog } from '../src/stores/memory-booking-store.js';

const APPOINTMENT: Appointment = {
  id: '8a6f0a3e-4c1b-4f0e-9d4e-2b7f1c9a0001',
  reference_code: 'APT-TEST23',
  slot_start: new Date('2026-03-02T09:00:00.000Z'),
  slot_end: new Date('2026-03-02T10:00:00.000Z'),
  subject_id: 'subject-1',
  status: 'confirmed',
  created_at: new Date('2026-03-01T12:00:00.000Z'),
  cancelled_at: null,
};

function confirmed(): BookingConfirmedEvent {
  return {
    name: 'BookingConfirmed',
    appointment_id: APPOINTMENT.id,
    appointment: APPOINTMENT,
    timestamp: '2026-03-01T12:00:00.000Z',
  };
}

describe('DomainEventBus', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('delivers events to typed subscribers', async () => {
    const bus = new DomainEventBus();
    const handler = vi.fn();
    bus.on('BookingConfirmed', handler);

    await bus.emit(confirmed());

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(confirmed());
    expect(bus.listenerCount('BookingConfirmed')).toBe(1);
    expect(bus.listenerCount('BookingCancelled')).toBe(0);
  });

  it('writes an audit entry per event', async () => {
    const audit = new InMemoryAuditLog();
    const bus = new DomainEventBus(audit);

    await bus.emit(confirmed());

    expect(audit.entries).toHaveLength(1);
    expect(audit.entries[0]).toMatchObject({
      event_type: 'domain.BookingConfirmed',
      entity_type: 'appointment',
      entity_id: APPOINTMENT.id,
      actor: 'event_bus',
      payload: {
        reference_code: 'APT-TEST23',
        slot_start: '2026-03-02T09:00:00.000Z',
        slot_end: '2026-03-02T10:00:00.000Z',
        status: 'confirmed',
      },
    });
  });

  it('keeps dispatching when the audit sink fails', async () => {
    const failing: AuditSink = { log: async () => { throw new Error('audit down'); } };
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const bus = new DomainEventBus(failing);
    const handler = vi.fn();
    bus.on('BookingConfirmed', handler);

    await bus.emit(confirmed());

    expect(handler).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('[event-bus] Audit log failed for BookingConfirmed:', expect.any(Error));
  });

  it('isolates a throwing handler from the emitter and other handlers', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const bus = new DomainEventBus();
    const after = vi.fn();
    bus.on('BookingConfirmed', () => { throw new Error('handler bug'); });
    bus.on('BookingConfirmed', after);

    await expect(bus.emit(confirmed())).resolves.toBeUndefined();
    expect(after).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('[event-bus] Handler error for BookingConfirmed:', expect.any(Error));
  });

  it('records recent events and clears listeners', async () => {
    const bus = new DomainEventBus();
    bus.on('BookingConfirmed', () => {});
    await bus.emit(confirmed());

    expect(bus.getRecentEvents()).toEqual([
      { name: 'BookingConfirmed', appointment_id: APPOINTMENT.id, timestamp: '2026-03-01T12:00:00.000Z' },
    ]);

    bus.removeAllListeners();
    expect(bus.listenerCount('BookingConfirmed')).toBe(0);
  });
});
