// ============================================================
// Wall-clock helpers — HH:mm times, yyyy-MM-dd dates, weekdays
// ============================================================

import { differenceInCalendarDays, eachDayOfInterval, format, getDay, isValid, parse } from 'date-fns';
import { WEEKDAYS, type CalendarDate, type DateWindow, type Weekday } from '../domain/types.js';

const START_TIME_RE = /^([01]\d|2[0-3]):[0-5]\d$/;
const END_TIME_RE = /^(([01]\d|2[0-3]):[0-5]\d|24:00)$/;
const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

// date-fns getDay(): 0 = Sunday
const WEEKDAY_BY_JS_DAY: readonly Weekday[] = [
  'sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday',
];

export function isStartTime(value: string): boolean {
  return START_TIME_RE.test(value);
}

export function isEndTime(value: string): boolean {
  return END_TIME_RE.test(value);
}

export function isWeekday(value: string): value is Weekday {
  return (WEEKDAYS as readonly string[]).includes(value);
}

/** Minutes since local midnight. Assumes a validated HH:mm (or 24:00). */
export function toMinutes(time: string): number {
  const [h, m] = time.split(':').map(Number);
  return h * 60 + m;
}

export function formatMinutes(minutes: number): string {
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`;
}

/** Half-open overlap test for two HH:mm intervals. */
export function intervalsOverlap(
  a: { start_time: string; end_time: string },
  b: { start_time: string; end_time: string },
): boolean {
  return toMinutes(a.start_time) < toMinutes(b.end_time)
    && toMinutes(b.start_time) < toMinutes(a.end_time);
}

function parseDate(value: string): Date {
  return parse(value, 'yyyy-MM-dd', new Date(0));
}

export function isCalendarDate(value: string): boolean {
  if (!DATE_RE.test(value)) return false;
  const parsed = parseDate(value);
  // Rejects rollovers such as 2026-02-30.
  return isValid(parsed) && format(parsed, 'yyyy-MM-dd') === value;
}

export function weekdayOf(date: CalendarDate): Weekday {
  return WEEKDAY_BY_JS_DAY[getDay(parseDate(date))];
}

export function weekdayIndex(weekday: Weekday): number {
  return WEEKDAYS.indexOf(weekday);
}

/** Inclusive list of calendar dates. Caller validates the window. */
export function eachDate(window: DateWindow): CalendarDate[] {
  return eachDayOfInterval({
    start: parseDate(window.startDate),
    end: parseDate(window.endDate),
  }).map((d) => format(d, 'yyyy-MM-dd'));
}

/** Number of dates in the inclusive window; <= 0 when reversed. */
export function windowLengthDays(window: DateWindow): number {
  return differenceInCalendarDays(parseDate(window.endDate), parseDate(window.startDate)) + 1;
}

export function isValidTimeZone(timezone: string): boolean {
  try {
    Intl.DateTimeFormat(undefined, { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}
