/**
 * Seed script — default configuration and a weekday schedule.
 *
 * Creates:
 *   1. The configuration row from DEFAULT_* env values (if absent)
 *   2. Monday–Friday 09:00–17:00 availability rules
 *
 * Rules are inserted through the rule repository, so re-running
 * the script reports the overlap instead of duplicating rules.
 *
 * Run:  npx tsx src/db/seed.ts
 */
import { pool } from './client.js';
import { env } from '../config/env.js';
import { configurationRepo } from '../repos/configuration.repo.js';
import { availabilityRuleRepo } from '../repos/availability-rule.repo.js';
import type { Weekday } from '../domain/types.js';

const WORKWEEK: readonly Weekday[] = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday'];

async function seed(): Promise<void> {
  console.log('[seed] Seeding database…');

  const config = await configurationRepo.getOrCreate({
    slot_duration_minutes: env.DEFAULT_SLOT_DURATION_MINUTES,
    max_appointments_per_slot: env.DEFAULT_MAX_APPOINTMENTS_PER_SLOT,
    timezone: env.DEFAULT_TIMEZONE,
    min_booking_lead_minutes: env.DEFAULT_MIN_BOOKING_LEAD_MINUTES,
  });
  console.log(
    `[seed] Configuration: ${config.slot_duration_minutes}-min slots, ` +
    `capacity ${config.max_appointments_per_slot}, ${config.timezone}`,
  );

  for (const weekday of WORKWEEK) {
    const result = await availabilityRuleRepo.create({
      weekday,
      start_time: '09:00',
      end_time: '17:00',
      active: true,
      recurring: true,
    });
    if (result.status === 'ok') {
      console.log(`[seed]   ${weekday} 09:00–17:00 (created)`);
    } else if (result.status === 'conflict') {
      console.log(`[seed]   ${weekday} (skipped, overlaps rule ${result.conflicting.id})`);
    }
  }

  console.log('[seed] Done.');
}

seed()
  .then(() => pool.end())
  .catch((err) => {
    console.error('Seed failed:', err);
    process.exit(1);
  });
