// ============================================================
// Domain Types — Appointment Engine
// ============================================================

export const WEEKDAYS = [
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
] as const;

export type Weekday = typeof WEEKDAYS[number];

/** Wall-clock time, HH:mm. `end_time` may be '24:00'. */
export type LocalTime = string;

/** Calendar date, yyyy-MM-dd. */
export type CalendarDate = string;

export interface Configuration {
  slot_duration_minutes: number;
  max_appointments_per_slot: number;
  timezone: string;               // IANA identifier
  min_booking_lead_minutes: number;
  updated_at: Date;
}

export type ConfigurationFields = Omit<Configuration, 'updated_at'>;

export interface AvailabilityRule {
  id: string;
  weekday: Weekday;
  start_time: LocalTime;
  end_time: LocalTime;
  active: boolean;
  recurring: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface AvailabilityRuleInput {
  weekday: Weekday;
  start_time: LocalTime;
  end_time: LocalTime;
  active?: boolean;
  recurring?: boolean;
}

export type AvailabilityRulePatch = Partial<AvailabilityRuleInput>;

export interface ExceptionDate {
  date: CalendarDate;
  reason: string;
  active: boolean;
  created_at: Date;
}

export interface DateWindow {
  startDate: CalendarDate;
  endDate: CalendarDate;   // inclusive
}

/** Derived, never persisted. */
export interface TimeSlot {
  start_at: Date;
  end_at: Date;
  capacity: number;
}

export interface SlotAvailability extends TimeSlot {
  remaining_capacity: number;
}

export type AppointmentStatus = 'confirmed' | 'cancelled';

/**
 * A committed booking. Holds a copy of the slot bounds, never a
 * reference to the rule that generated them.
 */
export interface Appointment {
  id: string;
  reference_code: string;
  slot_start: Date;
  slot_end: Date;
  subject_id: string;
  status: AppointmentStatus;
  created_at: Date;
  cancelled_at: Date | null;
}

export interface AppointmentQuery {
  status?: AppointmentStatus;
  subject_id?: string;
  from?: Date;
  to?: Date;
  limit?: number;
  offset?: number;
}

export interface SlotBookingCount {
  slot_start: Date;
  slot_end: Date;
  booked: number;
}

export interface AuditEntry {
  event_type: string;
  entity_type: string;
  entity_id: string | null;
  actor: string;
  payload: Record<string, unknown> | null;
  created_at?: Date;
}
