// ============================================================
// In-memory scheduling stores — configuration, rules, exceptions
//
// Used when STORE_MODE=memory and by the test suite. Each write
// completes without awaiting, so an overlap check and the insert
// it guards cannot interleave with another caller.
// ============================================================

import { v4 as uuidv4 } from 'uuid';
import type {
  AvailabilityRuleRepository,
  ConfigurationRepository,
  ExceptionDateRepository,
  RuleWriteResult,
} from '../domain/interfaces.js';
import type {
  AvailabilityRule,
  AvailabilityRuleInput,
  CalendarDate,
  Configuration,
  ConfigurationFields,
  DateWindow,
  ExceptionDate,
  Weekday,
} from '../domain/types.js';
import { intervalsOverlap, toMinutes, weekdayIndex } from '../utils/wall-clock.js';

export class InMemoryConfigurationRepository implements ConfigurationRepository {
  private current: Configuration | null = null;

  async getOrCreate(defaults: ConfigurationFields): Promise<Configuration> {
    if (!this.current) {
      this.current = { ...defaults, updated_at: new Date() };
    }
    return { ...this.current };
  }

  async update(patch: Partial<ConfigurationFields>): Promise<Configuration> {
    if (!this.current) throw new Error('Configuration has not been initialised');
    this.current = {
      slot_duration_minutes: patch.slot_duration_minutes ?? this.current.slot_duration_minutes,
      max_appointments_per_slot: patch.max_appointments_per_slot ?? this.current.max_appointments_per_slot,
      timezone: patch.timezone ?? this.current.timezone,
      min_booking_lead_minutes: patch.min_booking_lead_minutes ?? this.current.min_booking_lead_minutes,
      updated_at: new Date(),
    };
    return { ...this.current };
  }
}

export function compareRules(a: AvailabilityRule, b: AvailabilityRule): number {
  return weekdayIndex(a.weekday) - weekdayIndex(b.weekday)
    || toMinutes(a.start_time) - toMinutes(b.start_time);
}

export class InMemoryAvailabilityRuleRepository implements AvailabilityRuleRepository {
  private readonly rules = new Map<string, AvailabilityRule>();

  async findById(id: string): Promise<AvailabilityRule | null> {
    const rule = this.rules.get(id);
    return rule ? { ...rule } : null;
  }

  async list(weekday?: Weekday): Promise<AvailabilityRule[]> {
    return [...this.rules.values()]
      .filter((r) => !weekday || r.weekday === weekday)
      .sort(compareRules)
      .map((r) => ({ ...r }));
  }

  async listActive(): Promise<AvailabilityRule[]> {
    return (await this.list()).filter((r) => r.active);
  }

  async create(data: Required<AvailabilityRuleInput>): Promise<RuleWriteResult> {
    const conflicting = this.findConflict(data);
    if (conflicting) return { status: 'conflict', conflicting: { ...conflicting } };

    const now = new Date();
    const rule: AvailabilityRule = { id: uuidv4(), ...data, created_at: now, updated_at: now };
    this.rules.set(rule.id, rule);
    return { status: 'ok', rule: { ...rule } };
  }

  async update(id: string, data: Required<AvailabilityRuleInput>): Promise<RuleWriteResult> {
    const existing = this.rules.get(id);
    if (!existing) return { status: 'not_found' };

    const conflicting = this.findConflict(data, id);
    if (conflicting) return { status: 'conflict', conflicting: { ...conflicting } };

    const rule: AvailabilityRule = { ...existing, ...data, updated_at: new Date() };
    this.rules.set(id, rule);
    return { status: 'ok', rule: { ...rule } };
  }

  async delete(id: string): Promise<boolean> {
    return this.rules.delete(id);
  }

  private findConflict(data: Required<AvailabilityRuleInput>, excludeId?: string): AvailabilityRule | undefined {
    if (!data.active) return undefined;
    return [...this.rules.values()].find((r) =>
      r.id !== excludeId
      && r.active
      && r.weekday === data.weekday
      && intervalsOverlap(r, data),
    );
  }
}

export class InMemoryExceptionDateRepository implements ExceptionDateRepository {
  private readonly dates = new Map<CalendarDate, ExceptionDate>();

  async findByDate(date: CalendarDate): Promise<ExceptionDate | null> {
    const found = this.dates.get(date);
    return found ? { ...found } : null;
  }

  async list(window?: DateWindow): Promise<ExceptionDate[]> {
    // yyyy-MM-dd sorts lexically in date order
    return [...this.dates.values()]
      .filter((e) => !window || (e.date >= window.startDate && e.date <= window.endDate))
      .sort((a, b) => a.date.localeCompare(b.date))
      .map((e) => ({ ...e }));
  }

  async create(data: { date: CalendarDate; reason: string; active: boolean }): Promise<ExceptionDate | null> {
    if (this.dates.has(data.date)) return null;
    const exception: ExceptionDate = { ...data, created_at: new Date() };
    this.dates.set(data.date, exception);
    return { ...exception };
  }

  async update(date: CalendarDate, data: { reason?: string; active?: boolean }): Promise<ExceptionDate | null> {
    const existing = this.dates.get(date);
    if (!existing) return null;
    const updated: ExceptionDate = {
      ...existing,
      reason: data.reason ?? existing.reason,
      active: data.active ?? existing.active,
    };
    this.dates.set(date, updated);
    return { ...updated };
  }

  async delete(date: CalendarDate): Promise<boolean> {
    return this.dates.delete(date);
  }
}
