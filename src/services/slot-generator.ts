// ============================================================
// Slot Generator — rules + exceptions + configuration → slots
//
// Pure: no I/O, no clock reads. The caller passes `now`.
//
// Per calendar date in the (inclusive) window:
//   1. skip the date if it is an active exception
//   2. take the active rules for its weekday
//   3. cut each rule into slot_duration chunks from start_time;
//      a trailing remainder shorter than one slot is dropped
//   4. resolve each chunk start on that date in the configured
//      timezone; end_at = start_at + slot_duration
//   5. drop chunks starting before now + min_booking_lead
//
// DST: a chunk whose local start falls in a spring-forward gap
// does not exist on that date and is skipped. An ambiguous
// fall-back start resolves to the single instant date-fns-tz
// picks, so every wall-clock chunk is emitted once.
// ============================================================

import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import type {
  AvailabilityRule,
  CalendarDate,
  ConfigurationFields,
  DateWindow,
  TimeSlot,
  Weekday,
} from '../domain/types.js';
import { ValidationError } from '../domain/errors.js';
import {
  eachDate,
  formatMinutes,
  isCalendarDate,
  toMinutes,
  weekdayOf,
  windowLengthDays,
} from '../utils/wall-clock.js';

export interface SlotGenerationInput {
  rules: readonly AvailabilityRule[];
  /** Dates whose slots are suppressed (active exceptions only). */
  exceptions: ReadonlySet<CalendarDate>;
  configuration: ConfigurationFields;
  window: DateWindow;
  now: Date;
  /** Set false to keep slots inside the lead time (booking revalidation). */
  applyLeadTime?: boolean;
  maxWindowDays?: number;
}

/**
 * Throws ValidationError for malformed, reversed or oversized windows.
 */
export function assertWindow(window: DateWindow, maxWindowDays?: number): void {
  if (!isCalendarDate(window.startDate) || !isCalendarDate(window.endDate)) {
    throw new ValidationError('Window dates must be calendar dates (yyyy-MM-dd).', {
      startDate: window.startDate,
      endDate: window.endDate,
    });
  }
  const days = windowLengthDays(window);
  if (days < 1) {
    throw new ValidationError('Window end date must not be before its start date.', {
      startDate: window.startDate,
      endDate: window.endDate,
    });
  }
  if (maxWindowDays !== undefined && days > maxWindowDays) {
    throw new ValidationError(`Window spans ${days} days; the maximum is ${maxWindowDays}.`, {
      days,
      maxWindowDays,
    });
  }
}

/**
 * Lazy, finite, restartable sequence of slots in ascending start_at
 * order. Every `for…of` recomputes from the captured inputs.
 */
export function generateSlots(input: SlotGenerationInput): Iterable<TimeSlot> {
  assertWindow(input.window, input.maxWindowDays);
  return {
    [Symbol.iterator]: () => iterateSlots(input),
  };
}

function* iterateSlots(input: SlotGenerationInput): Generator<TimeSlot> {
  const { configuration } = input;
  const durationMs = configuration.slot_duration_minutes * 60_000;
  const earliestStart = input.applyLeadTime === false
    ? Number.NEGATIVE_INFINITY
    : input.now.getTime() + configuration.min_booking_lead_minutes * 60_000;

  const rulesByWeekday = groupActiveRules(input.rules);

  for (const date of eachDate(input.window)) {
    if (input.exceptions.has(date)) continue;

    const rules = rulesByWeekday.get(weekdayOf(date));
    if (!rules) continue;

    const daySlots: TimeSlot[] = [];
    for (const rule of rules) {
      for (const offset of chunkStarts(rule, configuration.slot_duration_minutes)) {
        const startAt = resolveLocalStart(date, offset, configuration.timezone);
        if (!startAt) continue;
        if (startAt.getTime() < earliestStart) continue;

        daySlots.push({
          start_at: startAt,
          end_at: new Date(startAt.getTime() + durationMs),
          capacity: configuration.max_appointments_per_slot,
        });
      }
    }

    daySlots.sort((a, b) => a.start_at.getTime() - b.start_at.getTime());
    yield* daySlots;
  }
}

function groupActiveRules(rules: readonly AvailabilityRule[]): Map<Weekday, AvailabilityRule[]> {
  const grouped = new Map<Weekday, AvailabilityRule[]>();
  for (const rule of rules) {
    if (!rule.active) continue;
    const list = grouped.get(rule.weekday) ?? [];
    list.push(rule);
    grouped.set(rule.weekday, list);
  }
  for (const list of grouped.values()) {
    list.sort((a, b) => toMinutes(a.start_time) - toMinutes(b.start_time));
  }
  return grouped;
}

/**
 * Minute offsets (from local midnight) of every whole chunk in the
 * rule interval. Floor semantics: chunk_end must be <= end_time.
 */
export function chunkStarts(
  rule: Pick<AvailabilityRule, 'start_time' | 'end_time'>,
  durationMinutes: number,
): number[] {
  const starts: number[] = [];
  const end = toMinutes(rule.end_time);
  for (let cursor = toMinutes(rule.start_time); cursor + durationMinutes <= end; cursor += durationMinutes) {
    starts.push(cursor);
  }
  return starts;
}

/**
 * UTC instant of a wall-clock time on `date` in `timezone`, or null
 * when that wall-clock time does not exist (DST gap).
 */
function resolveLocalStart(date: CalendarDate, minutes: number, timezone: string): Date | null {
  const local = `${date}T${formatMinutes(minutes)}:00`;
  const instant = fromZonedTime(local, timezone);
  if (formatInTimeZone(instant, timezone, "yyyy-MM-dd'T'HH:mm:ss") !== local) {
    return null;
  }
  return instant;
}

/** Calendar date an instant falls on in the given timezone. */
export function localDateOf(instant: Date, timezone: string): CalendarDate {
  return formatInTimeZone(instant, timezone, 'yyyy-MM-dd');
}

/** Stable identity of a slot: its exact [start, end) bounds. */
export function slotKey(start: Date, end: Date): string {
  return `${start.toISOString()}|${end.toISOString()}`;
}
