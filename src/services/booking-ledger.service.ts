// ============================================================
// Booking Ledger — confirmed appointments and slot capacity
//
// book():
//   1. read configuration + now
//   2. revalidate: the slot must still be generated by the
//      current rules/exceptions for its local date
//   3. lead-time check (after 2, so a vanished slot reports
//      unavailable even when it is also in the past)
//   4. atomic reserve against max_appointments_per_slot
//   5. emit BookingConfirmed
//
// No hold/TTL phase: a successful book() is final.
// ============================================================

import {
  AlreadyCancelledError,
  NotFoundError,
  SlotExpiredError,
  SlotFullError,
  SlotUnavailableError,
} from '../domain/errors.js';
import type { BookingStore } from '../domain/interfaces.js';
import type { Appointment, AppointmentQuery, ConfigurationFields, SlotBookingCount } from '../domain/types.js';
import type { DomainEventBus } from '../orchestrator/event-bus.js';
import { getNowUTC, type NowProvider } from './clock.js';
import type { AvailabilityRuleService } from './availability-rule.service.js';
import type { ConfigurationService } from './configuration.service.js';
import type { ExceptionCalendarService } from './exception-calendar.service.js';
import { generateSlots, localDateOf } from './slot-generator.js';

export interface BookingLedgerDeps {
  store: BookingStore;
  configuration: ConfigurationService;
  rules: AvailabilityRuleService;
  exceptions: ExceptionCalendarService;
  eventBus: DomainEventBus;
  clock?: NowProvider;
}

export class BookingLedger {
  private readonly store: BookingStore;
  private readonly configuration: ConfigurationService;
  private readonly rules: AvailabilityRuleService;
  private readonly exceptions: ExceptionCalendarService;
  private readonly eventBus: DomainEventBus;
  private readonly clock: NowProvider;

  constructor(deps: BookingLedgerDeps) {
    this.store = deps.store;
    this.configuration = deps.configuration;
    this.rules = deps.rules;
    this.exceptions = deps.exceptions;
    this.eventBus = deps.eventBus;
    this.clock = deps.clock ?? getNowUTC;
  }

  async book(slotStart: Date, slotEnd: Date, subjectId: string): Promise<Appointment> {
    const config = await this.configuration.get();
    const now = this.clock();

    if (!(await this.isGenerated(slotStart, slotEnd, config, now))) {
      throw new SlotUnavailableError('The requested time is not an available slot.', {
        slot_start: slotStart.toISOString(),
        slot_end: slotEnd.toISOString(),
      });
    }

    const earliest = now.getTime() + config.min_booking_lead_minutes * 60_000;
    if (slotStart.getTime() < earliest) {
      throw new SlotExpiredError('The requested slot starts too soon to be booked.', {
        slot_start: slotStart.toISOString(),
        earliest_start: new Date(earliest).toISOString(),
      });
    }

    const appointment = await this.store.reserve(
      { slot_start: slotStart, slot_end: slotEnd, subject_id: subjectId, created_at: now },
      config.max_appointments_per_slot,
    );
    if (!appointment) {
      throw new SlotFullError('The requested slot has no remaining capacity.', {
        slot_start: slotStart.toISOString(),
        capacity: config.max_appointments_per_slot,
      });
    }

    console.log(`[booking-ledger] Confirmed ${appointment.reference_code} ${appointment.slot_start.toISOString()}`);
    await this.eventBus.emit({
      name: 'BookingConfirmed',
      appointment_id: appointment.id,
      appointment,
      timestamp: now.toISOString(),
    });
    return appointment;
  }

  async cancel(id: string): Promise<Appointment> {
    const now = this.clock();
    const result = await this.store.release(id, now);

    if (result.status === 'not_found') {
      throw new NotFoundError(`Appointment ${id} not found.`, { id });
    }
    if (result.status === 'already_cancelled') {
      throw new AlreadyCancelledError(`Appointment ${id} is already cancelled.`, { id });
    }

    const { appointment } = result;
    console.log(`[booking-ledger] Cancelled ${appointment.reference_code}`);
    await this.eventBus.emit({
      name: 'BookingCancelled',
      appointment_id: appointment.id,
      appointment,
      timestamp: now.toISOString(),
    });
    return appointment;
  }

  async get(id: string): Promise<Appointment> {
    const appointment = await this.store.findById(id);
    if (!appointment) throw new NotFoundError(`Appointment ${id} not found.`, { id });
    return appointment;
  }

  async findByReference(referenceCode: string): Promise<Appointment> {
    const appointment = await this.store.findByReference(referenceCode);
    if (!appointment) {
      throw new NotFoundError(`Appointment ${referenceCode} not found.`, { reference_code: referenceCode });
    }
    return appointment;
  }

  async list(query: AppointmentQuery = {}): Promise<Appointment[]> {
    return this.store.list(query);
  }

  async bookedCounts(from: Date, to: Date): Promise<SlotBookingCount[]> {
    return this.store.bookedCounts(from, to);
  }

  /**
   * Regenerate the slot's local date without the lead filter and
   * look for an exact [start, end) match.
   */
  private async isGenerated(
    slotStart: Date,
    slotEnd: Date,
    config: ConfigurationFields,
    now: Date,
  ): Promise<boolean> {
    const date = localDateOf(slotStart, config.timezone);
    const window = { startDate: date, endDate: date };

    const [rules, exceptions] = await Promise.all([
      this.rules.listActive(),
      this.exceptions.activeDates(window),
    ]);

    const slots = generateSlots({
      rules,
      exceptions,
      configuration: config,
      window,
      now,
      applyLeadTime: false,
    });
    for (const slot of slots) {
      if (slot.start_at.getTime() === slotStart.getTime() && slot.end_at.getTime() === slotEnd.getTime()) {
        return true;
      }
    }
    return false;
  }
}
