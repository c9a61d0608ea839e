import { query, withTransaction } from '../db/client.js';
import type { AppointmentCreateData, BookingStore, ReleaseResult } from '../domain/interfaces.js';
import type { Appointment, AppointmentQuery, SlotBookingCount } from '../domain/types.js';
import { validate as isUuid } from 'uuid';
import { generateReferenceCode } from '../utils/reference-code.js';

const APPOINTMENT_COLUMNS = `id, reference_code, slot_start, slot_end, subject_id,
  status, created_at, cancelled_at`;

export const appointmentRepo: BookingStore = {
  /**
   * Conditional increment + insert in one transaction.
   *
   * The upsert takes a row lock on the slot counter, so concurrent
   * callers for the same slot queue behind each other and each one
   * re-evaluates `booked_count < capacity` against the committed
   * value. An empty RETURNING means the slot is full.
   */
  async reserve(data: AppointmentCreateData, capacity: number): Promise<Appointment | null> {
    return withTransaction(async (client) => {
      const counter = await client.query<{ booked_count: number }>(
        `INSERT INTO slot_capacity (slot_start, slot_end, booked_count)
         VALUES ($1, $2, 1)
         ON CONFLICT (slot_start, slot_end) DO UPDATE
           SET booked_count = slot_capacity.booked_count + 1,
               updated_at = NOW()
           WHERE slot_capacity.booked_count < $3
         RETURNING booked_count`,
        [data.slot_start.toISOString(), data.slot_end.toISOString(), capacity],
      );
      if (counter.rows.length === 0) return null;

      const { rows } = await client.query<Appointment>(
        `INSERT INTO appointments (reference_code, slot_start, slot_end, subject_id, status, created_at)
         VALUES ($1, $2, $3, $4, 'confirmed', $5)
         RETURNING ${APPOINTMENT_COLUMNS}`,
        [
          generateReferenceCode(),
          data.slot_start.toISOString(),
          data.slot_end.toISOString(),
          data.subject_id,
          data.created_at.toISOString(),
        ],
      );
      return rows[0];
    });
  },

  async release(id: string, cancelledAt: Date): Promise<ReleaseResult> {
    if (!isUuid(id)) return { status: 'not_found' };
    return withTransaction(async (client): Promise<ReleaseResult> => {
      // The status guard makes a second cancel a no-op instead of a second decrement.
      const { rows } = await client.query<Appointment>(
        `UPDATE appointments
         SET status = 'cancelled', cancelled_at = $2
         WHERE id = $1 AND status = 'confirmed'
         RETURNING ${APPOINTMENT_COLUMNS}`,
        [id, cancelledAt.toISOString()],
      );
      const cancelled = rows[0];

      if (!cancelled) {
        const existing = await client.query<Appointment>(
          `SELECT ${APPOINTMENT_COLUMNS} FROM appointments WHERE id = $1`,
          [id],
        );
        return existing.rows[0]
          ? { status: 'already_cancelled', appointment: existing.rows[0] }
          : { status: 'not_found' };
      }

      await client.query(
        `UPDATE slot_capacity
         SET booked_count = booked_count - 1, updated_at = NOW()
         WHERE slot_start = $1 AND slot_end = $2 AND booked_count > 0`,
        [cancelled.slot_start.toISOString(), cancelled.slot_end.toISOString()],
      );
      return { status: 'cancelled', appointment: cancelled };
    });
  },

  async findById(id: string): Promise<Appointment | null> {
    if (!isUuid(id)) return null;
    const { rows } = await query<Appointment>(
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointments WHERE id = $1`,
      [id],
    );
    return rows[0] ?? null;
  },

  async findByReference(referenceCode: string): Promise<Appointment | null> {
    const { rows } = await query<Appointment>(
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointments WHERE reference_code = $1`,
      [referenceCode],
    );
    return rows[0] ?? null;
  },

  async list(q: AppointmentQuery): Promise<Appointment[]> {
    const { rows } = await query<Appointment>(
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointments
       WHERE ($1::text IS NULL OR status = $1)
         AND ($2::text IS NULL OR subject_id = $2)
         AND ($3::timestamptz IS NULL OR slot_start >= $3)
         AND ($4::timestamptz IS NULL OR slot_start < $4)
       ORDER BY slot_start ASC
       LIMIT $5 OFFSET $6`,
      [
        q.status ?? null,
        q.subject_id ?? null,
        q.from?.toISOString() ?? null,
        q.to?.toISOString() ?? null,
        q.limit ?? 50,
        q.offset ?? 0,
      ],
    );
    return rows;
  },

  async bookedCounts(from: Date, to: Date): Promise<SlotBookingCount[]> {
    const { rows } = await query<SlotBookingCount>(
      `SELECT slot_start, slot_end, booked_count AS booked
       FROM slot_capacity
       WHERE slot_start >= $1 AND slot_start < $2 AND booked_count > 0`,
      [from.toISOString(), to.toISOString()],
    );
    return rows;
  },
};
