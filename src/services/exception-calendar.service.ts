// ============================================================
// Exception Calendar — dates on which no slots are generated
// ============================================================

import { DuplicateExceptionError, NotFoundError, ValidationError } from '../domain/errors.js';
import type { AuditSink, ExceptionDateRepository } from '../domain/interfaces.js';
import type { CalendarDate, DateWindow, ExceptionDate } from '../domain/types.js';
import { isCalendarDate } from '../utils/wall-clock.js';
import { assertWindow } from './slot-generator.js';

function assertDate(date: string): void {
  if (!isCalendarDate(date)) {
    throw new ValidationError(`"${date}" is not a calendar date (yyyy-MM-dd).`, { date });
  }
}

export class ExceptionCalendarService {
  constructor(
    private readonly repo: ExceptionDateRepository,
    private readonly audit: AuditSink,
  ) {}

  async add(date: CalendarDate, reason = ''): Promise<ExceptionDate> {
    assertDate(date);
    const created = await this.repo.create({ date, reason, active: true });
    if (!created) {
      throw new DuplicateExceptionError(`Exception date ${date} already exists.`, { date });
    }

    await this.record('exception_date.created', created);
    console.log(`[exception-calendar] Added ${date}${reason ? ` (${reason})` : ''}`);
    return created;
  }

  async update(date: CalendarDate, patch: { reason?: string; active?: boolean }): Promise<ExceptionDate> {
    assertDate(date);
    const updated = await this.repo.update(date, patch);
    if (!updated) throw new NotFoundError(`Exception date ${date} not found.`, { date });

    await this.record('exception_date.updated', updated);
    return updated;
  }

  async remove(date: CalendarDate): Promise<void> {
    assertDate(date);
    const deleted = await this.repo.delete(date);
    if (!deleted) throw new NotFoundError(`Exception date ${date} not found.`, { date });

    await this.audit.log({
      event_type: 'exception_date.deleted',
      entity_type: 'exception_date',
      entity_id: date,
      actor: 'admin',
      payload: null,
    });
    console.log(`[exception-calendar] Removed ${date}`);
  }

  /** True only for an active exception. */
  async contains(date: CalendarDate): Promise<boolean> {
    if (!isCalendarDate(date)) return false;
    const found = await this.repo.findByDate(date);
    return found?.active ?? false;
  }

  async list(window?: DateWindow): Promise<ExceptionDate[]> {
    if (window) assertWindow(window);
    return this.repo.list(window);
  }

  /** Active exception dates inside the window, for slot generation. */
  async activeDates(window: DateWindow): Promise<Set<CalendarDate>> {
    const entries = await this.repo.list(window);
    return new Set(entries.filter((e) => e.active).map((e) => e.date));
  }

  private async record(eventType: string, entry: ExceptionDate): Promise<void> {
    await this.audit.log({
      event_type: eventType,
      entity_type: 'exception_date',
      entity_id: entry.date,
      actor: 'admin',
      payload: { reason: entry.reason, active: entry.active },
    });
  }
}
