// ============================================================
// Store Interfaces — Abstraction over engine persistence
//
// Implementations:
//   repos/*.repo.ts       — PostgreSQL (default)
//   stores/memory-*.ts    — in-process, for demo mode and tests
// ============================================================

import type {
  Appointment,
  AppointmentQuery,
  AuditEntry,
  AvailabilityRule,
  AvailabilityRuleInput,
  CalendarDate,
  Configuration,
  ConfigurationFields,
  DateWindow,
  ExceptionDate,
  SlotBookingCount,
  Weekday,
} from './types.js';

export interface ConfigurationRepository {
  /** Insert `defaults` if no configuration exists yet, then return the live one. */
  getOrCreate(defaults: ConfigurationFields): Promise<Configuration>;
  /**
   * Overwrite only the fields present in `patch`, merged against the
   * stored row in one write. The row must already exist.
   */
  update(patch: Partial<ConfigurationFields>): Promise<Configuration>;
}

/**
 * Result of a rule write. Overlap detection and the write happen
 * in one atomic step inside the repository.
 */
export type RuleWriteResult =
  | { status: 'ok'; rule: AvailabilityRule }
  | { status: 'conflict'; conflicting: AvailabilityRule }
  | { status: 'not_found' };

export interface AvailabilityRuleRepository {
  findById(id: string): Promise<AvailabilityRule | null>;
  list(weekday?: Weekday): Promise<AvailabilityRule[]>;
  listActive(): Promise<AvailabilityRule[]>;
  create(data: Required<AvailabilityRuleInput>): Promise<RuleWriteResult>;
  update(id: string, data: Required<AvailabilityRuleInput>): Promise<RuleWriteResult>;
  delete(id: string): Promise<boolean>;
}

export interface ExceptionDateRepository {
  findByDate(date: CalendarDate): Promise<ExceptionDate | null>;
  list(window?: DateWindow): Promise<ExceptionDate[]>;
  /** Returns null when the date is already present. */
  create(data: { date: CalendarDate; reason: string; active: boolean }): Promise<ExceptionDate | null>;
  update(date: CalendarDate, data: { reason?: string; active?: boolean }): Promise<ExceptionDate | null>;
  delete(date: CalendarDate): Promise<boolean>;
}

/**
 * Data required to create a new appointment.
 */
export interface AppointmentCreateData {
  slot_start: Date;
  slot_end: Date;
  subject_id: string;
  created_at: Date;
}

export type ReleaseResult =
  | { status: 'cancelled'; appointment: Appointment }
  | { status: 'already_cancelled'; appointment: Appointment }
  | { status: 'not_found' };

/**
 * Appointment persistence plus the per-slot booked counter.
 *
 * `reserve` and `release` are the only writes and each is atomic:
 * the counter and the appointment row change together or not at all.
 */
export interface BookingStore {
  /**
   * If fewer than `capacity` confirmed appointments hold the slot,
   * increment its count and insert a confirmed appointment.
   * Returns null when the slot is full.
   */
  reserve(data: AppointmentCreateData, capacity: number): Promise<Appointment | null>;
  /** Confirmed → cancelled, decrementing the slot count by exactly one. */
  release(id: string, cancelledAt: Date): Promise<ReleaseResult>;

  findById(id: string): Promise<Appointment | null>;
  findByReference(referenceCode: string): Promise<Appointment | null>;
  list(query: AppointmentQuery): Promise<Appointment[]>;
  /** Non-zero booked counts for slots starting in [from, to). */
  bookedCounts(from: Date, to: Date): Promise<SlotBookingCount[]>;
}

export interface AuditSink {
  log(entry: AuditEntry): Promise<void>;
}

/** Everything the engine persists, resolved once per process. */
export interface EngineStores {
  configuration: ConfigurationRepository;
  rules: AvailabilityRuleRepository;
  exceptions: ExceptionDateRepository;
  bookings: BookingStore;
  audit: AuditSink;
}
