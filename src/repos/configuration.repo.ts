import { query } from '../db/client.js';
import type { ConfigurationRepository } from '../domain/interfaces.js';
import type { Configuration, ConfigurationFields } from '../domain/types.js';

const COLUMNS = `slot_duration_minutes, max_appointments_per_slot, timezone,
  min_booking_lead_minutes, updated_at`;

async function selectConfiguration(): Promise<Configuration | null> {
  const { rows } = await query<Configuration>(
    `SELECT ${COLUMNS} FROM scheduling_configuration LIMIT 1`,
  );
  return rows[0] ?? null;
}

export const configurationRepo: ConfigurationRepository = {
  async getOrCreate(defaults: ConfigurationFields): Promise<Configuration> {
    const existing = await selectConfiguration();
    if (existing) return existing;

    // The singleton index turns a concurrent second insert into a no-op.
    await query(
      `INSERT INTO scheduling_configuration
         (slot_duration_minutes, max_appointments_per_slot, timezone, min_booking_lead_minutes)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT DO NOTHING`,
      [
        defaults.slot_duration_minutes,
        defaults.max_appointments_per_slot,
        defaults.timezone,
        defaults.min_booking_lead_minutes,
      ],
    );

    const created = await selectConfiguration();
    if (!created) throw new Error('scheduling_configuration row missing after insert');
    return created;
  },

  async update(patch: Partial<ConfigurationFields>): Promise<Configuration> {
    // Absent fields bind NULL and keep the stored value, so two
    // concurrent partial updates cannot overwrite each other's fields.
    const { rows } = await query<Configuration>(
      `UPDATE scheduling_configuration
       SET slot_duration_minutes = COALESCE($1, slot_duration_minutes),
           max_appointments_per_slot = COALESCE($2, max_appointments_per_slot),
           timezone = COALESCE($3, timezone),
           min_booking_lead_minutes = COALESCE($4, min_booking_lead_minutes),
           updated_at = NOW()
       RETURNING ${COLUMNS}`,
      [
        patch.slot_duration_minutes ?? null,
        patch.max_appointments_per_slot ?? null,
        patch.timezone ?? null,
        patch.min_booking_lead_minutes ?? null,
      ],
    );
    const updated = rows[0];
    if (!updated) throw new Error('scheduling_configuration row missing on update');
    return updated;
  },
};
