import { advisoryXactLock, query, withTransaction, type Queryable } from '../db/client.js';
import type { AvailabilityRuleRepository, RuleWriteResult } from '../domain/interfaces.js';
import type { AvailabilityRule, AvailabilityRuleInput, Weekday } from '../domain/types.js';
import { validate as isUuid } from 'uuid';

const SELECT_RULE = `SELECT id, weekday, start_time, end_time,
  is_active AS active, is_recurring AS recurring, created_at, updated_at
  FROM availability_rules`;

const ORDER_BY = `ORDER BY array_position(
  ARRAY['monday','tuesday','wednesday','thursday','friday','saturday','sunday'], weekday),
  start_time`;

/**
 * Active rule on the same weekday overlapping [start, end).
 * HH:mm text compares in time order, '24:00' included.
 */
async function findConflict(
  client: Queryable,
  data: Required<AvailabilityRuleInput>,
  excludeId: string | null,
): Promise<AvailabilityRule | null> {
  if (!data.active) return null;
  const { rows } = await client.query<AvailabilityRule>(
    `${SELECT_RULE}
     WHERE weekday = $1
       AND is_active
       AND start_time < $3
       AND end_time > $2
       AND ($4::uuid IS NULL OR id <> $4::uuid)
     LIMIT 1`,
    [data.weekday, data.start_time, data.end_time, excludeId],
  );
  return rows[0] ?? null;
}

export const availabilityRuleRepo: AvailabilityRuleRepository = {
  async findById(id: string): Promise<AvailabilityRule | null> {
    if (!isUuid(id)) return null;
    const { rows } = await query<AvailabilityRule>(`${SELECT_RULE} WHERE id = $1`, [id]);
    return rows[0] ?? null;
  },

  async list(weekday?: Weekday): Promise<AvailabilityRule[]> {
    const { rows } = weekday
      ? await query<AvailabilityRule>(`${SELECT_RULE} WHERE weekday = $1 ${ORDER_BY}`, [weekday])
      : await query<AvailabilityRule>(`${SELECT_RULE} ${ORDER_BY}`);
    return rows;
  },

  async listActive(): Promise<AvailabilityRule[]> {
    const { rows } = await query<AvailabilityRule>(`${SELECT_RULE} WHERE is_active ${ORDER_BY}`);
    return rows;
  },

  async create(data: Required<AvailabilityRuleInput>): Promise<RuleWriteResult> {
    return withTransaction(async (client) => {
      // Serialize writers per weekday so two overlapping inserts cannot both pass the check.
      await advisoryXactLock(client, `availability_rules:${data.weekday}`);

      const conflicting = await findConflict(client, data, null);
      if (conflicting) return { status: 'conflict', conflicting };

      const { rows } = await client.query<AvailabilityRule>(
        `INSERT INTO availability_rules (weekday, start_time, end_time, is_active, is_recurring)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING id, weekday, start_time, end_time,
           is_active AS active, is_recurring AS recurring, created_at, updated_at`,
        [data.weekday, data.start_time, data.end_time, data.active, data.recurring],
      );
      return { status: 'ok', rule: rows[0] };
    });
  },

  async update(id: string, data: Required<AvailabilityRuleInput>): Promise<RuleWriteResult> {
    if (!isUuid(id)) return { status: 'not_found' };
    return withTransaction(async (client) => {
      await advisoryXactLock(client, `availability_rules:${data.weekday}`);

      const conflicting = await findConflict(client, data, id);
      if (conflicting) return { status: 'conflict', conflicting };

      const { rows } = await client.query<AvailabilityRule>(
        `UPDATE availability_rules
         SET weekday = $2, start_time = $3, end_time = $4,
             is_active = $5, is_recurring = $6, updated_at = NOW()
         WHERE id = $1
         RETURNING id, weekday, start_time, end_time,
           is_active AS active, is_recurring AS recurring, created_at, updated_at`,
        [id, data.weekday, data.start_time, data.end_time, data.active, data.recurring],
      );
      return rows[0] ? { status: 'ok', rule: rows[0] } : { status: 'not_found' };
    });
  },

  async delete(id: string): Promise<boolean> {
    if (!isUuid(id)) return false;
    const { rowCount } = await query('DELETE FROM availability_rules WHERE id = $1', [id]);
    return (rowCount ?? 0) > 0;
  },
};
