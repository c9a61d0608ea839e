// ============================================================
// InMemoryBookingStore — BookingStore held in process memory
//
// reserve() and release() read and write the slot counter with no
// await in between, so concurrent callers in this process are
// totally ordered by the event loop. Single-instance only: two
// processes each holding their own store share nothing.
// ============================================================

import { v4 as uuidv4 } from 'uuid';
import type {
  AppointmentCreateData,
  AuditSink,
  BookingStore,
  ReleaseResult,
} from '../domain/interfaces.js';
import type { Appointment, AppointmentQuery, AuditEntry, SlotBookingCount } from '../domain/types.js';
import { slotKey } from '../services/slot-generator.js';
import { generateReferenceCode } from '../utils/reference-code.js';

interface SlotCounter {
  slot_start: Date;
  slot_end: Date;
  booked: number;
}

export class InMemoryBookingStore implements BookingStore {
  private readonly appointments = new Map<string, Appointment>();
  private readonly counters = new Map<string, SlotCounter>();

  async reserve(data: AppointmentCreateData, capacity: number): Promise<Appointment | null> {
    const key = slotKey(data.slot_start, data.slot_end);
    const counter = this.counters.get(key)
      ?? { slot_start: data.slot_start, slot_end: data.slot_end, booked: 0 };

    if (counter.booked >= capacity) return null;

    counter.booked += 1;
    this.counters.set(key, counter);

    const appointment: Appointment = {
      id: uuidv4(),
      reference_code: generateReferenceCode(),
      slot_start: new Date(data.slot_start),
      slot_end: new Date(data.slot_end),
      subject_id: data.subject_id,
      status: 'confirmed',
      created_at: data.created_at,
      cancelled_at: null,
    };
    this.appointments.set(appointment.id, appointment);
    return { ...appointment };
  }

  async release(id: string, cancelledAt: Date): Promise<ReleaseResult> {
    const existing = this.appointments.get(id);
    if (!existing) return { status: 'not_found' };
    if (existing.status === 'cancelled') {
      return { status: 'already_cancelled', appointment: { ...existing } };
    }

    const cancelled: Appointment = { ...existing, status: 'cancelled', cancelled_at: cancelledAt };
    this.appointments.set(id, cancelled);

    const counter = this.counters.get(slotKey(existing.slot_start, existing.slot_end));
    if (counter && counter.booked > 0) {
      counter.booked -= 1;
    }
    return { status: 'cancelled', appointment: { ...cancelled } };
  }

  async findById(id: string): Promise<Appointment | null> {
    const found = this.appointments.get(id);
    return found ? { ...found } : null;
  }

  async findByReference(referenceCode: string): Promise<Appointment | null> {
    for (const apt of this.appointments.values()) {
      if (apt.reference_code === referenceCode) return { ...apt };
    }
    return null;
  }

  async list(query: AppointmentQuery): Promise<Appointment[]> {
    const offset = query.offset ?? 0;
    const limit = query.limit ?? 50;
    return [...this.appointments.values()]
      .filter((a) =>
        (!query.status || a.status === query.status)
        && (!query.subject_id || a.subject_id === query.subject_id)
        && (!query.from || a.slot_start >= query.from)
        && (!query.to || a.slot_start < query.to))
      .sort((a, b) => a.slot_start.getTime() - b.slot_start.getTime())
      .slice(offset, offset + limit)
      .map((a) => ({ ...a }));
  }

  async bookedCounts(from: Date, to: Date): Promise<SlotBookingCount[]> {
    const counts: SlotBookingCount[] = [];
    for (const c of this.counters.values()) {
      if (c.booked > 0 && c.slot_start >= from && c.slot_start < to) {
        counts.push({ slot_start: c.slot_start, slot_end: c.slot_end, booked: c.booked });
      }
    }
    return counts;
  }
}

export class InMemoryAuditLog implements AuditSink {
  readonly entries: AuditEntry[] = [];

  async log(entry: AuditEntry): Promise<void> {
    this.entries.push({ ...entry, created_at: new Date() });
  }
}
