// ============================================================
// Appointment Scheduler — the public face of the engine
//
// Availability = generated slots (lead-filtered) joined with the
// ledger's booked counts. Booking requests are checked for shape
// here and for availability/capacity in the ledger.
// ============================================================

import { addDays, isValid, parseISO } from 'date-fns';
import { fromZonedTime } from 'date-fns-tz';
import { SlotUnavailableError, ValidationError } from '../domain/errors.js';
import type { Appointment, DateWindow, SlotAvailability } from '../domain/types.js';
import { getNowUTC, type NowProvider } from './clock.js';
import type { AvailabilityRuleService } from './availability-rule.service.js';
import type { BookingLedger } from './booking-ledger.service.js';
import type { ConfigurationService } from './configuration.service.js';
import type { ExceptionCalendarService } from './exception-calendar.service.js';
import { assertWindow, generateSlots, slotKey } from './slot-generator.js';

export interface SchedulerDeps {
  configuration: ConfigurationService;
  rules: AvailabilityRuleService;
  exceptions: ExceptionCalendarService;
  ledger: BookingLedger;
  clock?: NowProvider;
  maxWindowDays?: number;
}

export interface ListSlotsOptions {
  /** Keep slots whose remaining capacity is zero (admin view). */
  includeFull?: boolean;
}

export class AppointmentScheduler {
  private readonly deps: SchedulerDeps;
  private readonly clock: NowProvider;

  constructor(deps: SchedulerDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? getNowUTC;
  }

  async listAvailableSlots(window: DateWindow, options: ListSlotsOptions = {}): Promise<SlotAvailability[]> {
    assertWindow(window, this.deps.maxWindowDays);

    const [config, rules, exceptions] = await Promise.all([
      this.deps.configuration.get(),
      this.deps.rules.listActive(),
      this.deps.exceptions.activeDates(window),
    ]);

    const slots = generateSlots({
      rules,
      exceptions,
      configuration: config,
      window,
      now: this.clock(),
      maxWindowDays: this.deps.maxWindowDays,
    });

    // Local midnight at both window edges bounds every generated start.
    const from = fromZonedTime(`${window.startDate}T00:00:00`, config.timezone);
    const to = addDays(fromZonedTime(`${window.endDate}T00:00:00`, config.timezone), 2);
    const booked = new Map<string, number>();
    for (const count of await this.deps.ledger.bookedCounts(from, to)) {
      booked.set(slotKey(count.slot_start, count.slot_end), count.booked);
    }

    const result: SlotAvailability[] = [];
    for (const slot of slots) {
      const remaining = slot.capacity - (booked.get(slotKey(slot.start_at, slot.end_at)) ?? 0);
      if (remaining <= 0 && !options.includeFull) continue;
      result.push({ ...slot, remaining_capacity: Math.max(remaining, 0) });
    }
    return result;
  }

  /**
   * Validate the request's shape, then hand off to the ledger.
   * Bounds are compared exactly; a request is never rounded onto
   * a nearby slot.
   */
  async requestBooking(slotStart: string | Date, slotEnd: string | Date, subjectId: string): Promise<Appointment> {
    const start = toInstant(slotStart);
    const end = toInstant(slotEnd);
    if (!start || !end) {
      throw new SlotUnavailableError('Slot bounds must be ISO-8601 instants with an explicit offset.', {
        slot_start: String(slotStart),
        slot_end: String(slotEnd),
      });
    }
    if (end.getTime() <= start.getTime()) {
      throw new SlotUnavailableError('Slot end must be after slot start.', {
        slot_start: start.toISOString(),
        slot_end: end.toISOString(),
      });
    }

    const config = await this.deps.configuration.get();
    const lengthMinutes = (end.getTime() - start.getTime()) / 60_000;
    if (lengthMinutes !== config.slot_duration_minutes) {
      throw new SlotUnavailableError(
        `Slot length is ${lengthMinutes} minutes; slots are ${config.slot_duration_minutes} minutes.`,
        { slot_start: start.toISOString(), slot_end: end.toISOString() },
      );
    }

    if (subjectId.trim().length === 0) {
      throw new ValidationError('subject_id must not be empty.', { field: 'subject_id' });
    }

    return this.deps.ledger.book(start, end, subjectId);
  }

  async cancelBooking(appointmentId: string): Promise<Appointment> {
    return this.deps.ledger.cancel(appointmentId);
  }
}

// A string without Z or ±hh:mm would be read in the host's timezone.
const EXPLICIT_OFFSET_RE = /T.*(Z|[+-]\d{2}(:?\d{2})?)$/i;

function toInstant(value: string | Date): Date | null {
  if (typeof value === 'string' && !EXPLICIT_OFFSET_RE.test(value)) return null;
  const date = typeof value === 'string' ? parseISO(value) : value;
  return isValid(date) ? date : null;
}
