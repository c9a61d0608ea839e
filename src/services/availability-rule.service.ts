// ============================================================
// Availability Rule Service
//
// Weekly recurring windows of bookable time. Active rules on the
// same weekday must not overlap; [09:00,12:00) and [12:00,15:00)
// touch and are both accepted.
// ============================================================

import { InvalidRuleError, NotFoundError, RuleConflictError } from '../domain/errors.js';
import type { AuditSink, AvailabilityRuleRepository, RuleWriteResult } from '../domain/interfaces.js';
import type {
  AvailabilityRule,
  AvailabilityRuleInput,
  AvailabilityRulePatch,
  Weekday,
} from '../domain/types.js';
import { isEndTime, isStartTime, isWeekday, toMinutes } from '../utils/wall-clock.js';

function validateRule(rule: Required<AvailabilityRuleInput>): void {
  const problems: string[] = [];
  if (!isWeekday(rule.weekday)) problems.push(`weekday "${rule.weekday}" is not a weekday name`);
  if (!isStartTime(rule.start_time)) problems.push(`start_time "${rule.start_time}" is not HH:mm`);
  if (!isEndTime(rule.end_time)) problems.push(`end_time "${rule.end_time}" is not HH:mm`);

  if (problems.length === 0 && toMinutes(rule.end_time) <= toMinutes(rule.start_time)) {
    problems.push('end_time must be after start_time');
  }
  if (problems.length > 0) {
    throw new InvalidRuleError(`Invalid availability rule: ${problems.join('; ')}.`, { problems });
  }
}

export class AvailabilityRuleService {
  constructor(
    private readonly repo: AvailabilityRuleRepository,
    private readonly audit: AuditSink,
  ) {}

  async add(input: AvailabilityRuleInput): Promise<AvailabilityRule> {
    const rule: Required<AvailabilityRuleInput> = {
      weekday: input.weekday,
      start_time: input.start_time,
      end_time: input.end_time,
      active: input.active ?? true,
      recurring: input.recurring ?? true,
    };
    validateRule(rule);

    const created = this.unwrap(await this.repo.create(rule), null);
    await this.record('availability_rule.created', created);
    console.log(`[availability-rules] Added ${created.weekday} ${created.start_time}-${created.end_time}`);
    return created;
  }

  async update(id: string, patch: AvailabilityRulePatch): Promise<AvailabilityRule> {
    const existing = await this.repo.findById(id);
    if (!existing) throw new NotFoundError(`Availability rule ${id} not found.`, { id });

    const merged: Required<AvailabilityRuleInput> = {
      weekday: patch.weekday ?? existing.weekday,
      start_time: patch.start_time ?? existing.start_time,
      end_time: patch.end_time ?? existing.end_time,
      active: patch.active ?? existing.active,
      recurring: patch.recurring ?? existing.recurring,
    };
    validateRule(merged);

    const updated = this.unwrap(await this.repo.update(id, merged), id);
    await this.record('availability_rule.updated', updated);
    return updated;
  }

  async remove(id: string): Promise<void> {
    const deleted = await this.repo.delete(id);
    if (!deleted) throw new NotFoundError(`Availability rule ${id} not found.`, { id });

    await this.audit.log({
      event_type: 'availability_rule.deleted',
      entity_type: 'availability_rule',
      entity_id: id,
      actor: 'admin',
      payload: null,
    });
    console.log(`[availability-rules] Removed ${id}`);
  }

  async get(id: string): Promise<AvailabilityRule> {
    const rule = await this.repo.findById(id);
    if (!rule) throw new NotFoundError(`Availability rule ${id} not found.`, { id });
    return rule;
  }

  async list(weekday?: Weekday): Promise<AvailabilityRule[]> {
    return this.repo.list(weekday);
  }

  async listActive(): Promise<AvailabilityRule[]> {
    return this.repo.listActive();
  }

  private unwrap(result: RuleWriteResult, id: string | null): AvailabilityRule {
    switch (result.status) {
      case 'ok':
        return result.rule;
      case 'conflict': {
        const other = result.conflicting;
        throw new RuleConflictError(
          `Overlaps active rule ${other.id} (${other.weekday} ${other.start_time}-${other.end_time}).`,
          { conflicting_rule_id: other.id },
        );
      }
      case 'not_found':
        throw new NotFoundError(`Availability rule ${id ?? ''} not found.`, { id });
    }
  }

  private async record(eventType: string, rule: AvailabilityRule): Promise<void> {
    await this.audit.log({
      event_type: eventType,
      entity_type: 'availability_rule',
      entity_id: rule.id,
      actor: 'admin',
      payload: {
        weekday: rule.weekday,
        start_time: rule.start_time,
        end_time: rule.end_time,
        active: rule.active,
        recurring: rule.recurring,
      },
    });
  }
}
