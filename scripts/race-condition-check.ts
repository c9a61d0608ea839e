/**
 * Race-Condition Check
 * ====================
 * Fires concurrent reservations for the same slot at a real
 * PostgreSQL database and verifies the slot counter never exceeds
 * its capacity.
 *
 * Prerequisites:
 *   - PostgreSQL running with DATABASE_URL configured
 *   - Migrations applied (npm run migrate)
 *
 * Run:
 *   npx tsx scripts/race-condition-check.ts
 */

import { pool } from '../src/db/client.js';
import { appointmentRepo } from '../src/repos/appointment.repo.js';

// ── Config ──────────────────────────────────────────────────────
const NUM_CONCURRENT = 12;
const CAPACITY = 3;

// A far-future slot no real schedule will produce; cleaned up at the end.
const SLOT_START = new Date(Date.UTC(2099, 0, 5, 10, 0) + Math.floor(Math.random() * 1000) * 3_600_000);
const SLOT_END = new Date(SLOT_START.getTime() + 30 * 60_000);

async function bookedCount(): Promise<number> {
  const { rows } = await pool.query<{ booked_count: number }>(
    'SELECT booked_count FROM slot_capacity WHERE slot_start = $1 AND slot_end = $2',
    [SLOT_START.toISOString(), SLOT_END.toISOString()],
  );
  return rows[0]?.booked_count ?? 0;
}

// ── Check 1: concurrent reserves never exceed capacity ──────────
async function checkConcurrentReserves(): Promise<string[]> {
  console.log(`\n[race] Check 1: ${NUM_CONCURRENT} parallel reserves, capacity ${CAPACITY}`);

  const results = await Promise.allSettled(
    Array.from({ length: NUM_CONCURRENT }, (_, i) =>
      appointmentRepo.reserve(
        { slot_start: SLOT_START, slot_end: SLOT_END, subject_id: `race-subject-${i}`, created_at: new Date() },
        CAPACITY,
      ),
    ),
  );

  const ids: string[] = [];
  let full = 0;
  let errored = 0;
  for (const result of results) {
    if (result.status === 'rejected') {
      errored += 1;
      console.error('[race]   reserve failed:', result.reason);
    } else if (result.value) {
      ids.push(result.value.id);
    } else {
      full += 1;
    }
  }

  const count = await bookedCount();
  console.log(`[race]   confirmed=${ids.length} full=${full} errors=${errored} counter=${count}`);
  if (ids.length !== CAPACITY || full !== NUM_CONCURRENT - CAPACITY || count !== CAPACITY) {
    throw new Error('Check 1 FAILED: capacity was not respected under concurrency.');
  }
  console.log('[race]   PASS');
  return ids;
}

// ── Check 2: cancelling frees exactly one place ─────────────────
async function checkReleaseAndRebook(ids: string[]): Promise<void> {
  console.log('\n[race] Check 2: cancel one, then race two more reserves');

  const [first] = ids;
  const released = await appointmentRepo.release(first, new Date());
  const again = await appointmentRepo.release(first, new Date());
  if (released.status !== 'cancelled' || again.status !== 'already_cancelled') {
    throw new Error(`Check 2 FAILED: release returned ${released.status} then ${again.status}.`);
  }

  const results = await Promise.all([
    appointmentRepo.reserve({ slot_start: SLOT_START, slot_end: SLOT_END, subject_id: 'race-rebook-a', created_at: new Date() }, CAPACITY),
    appointmentRepo.reserve({ slot_start: SLOT_START, slot_end: SLOT_END, subject_id: 'race-rebook-b', created_at: new Date() }, CAPACITY),
  ]);
  const confirmed = results.filter((r) => r !== null).length;
  const count = await bookedCount();
  console.log(`[race]   rebooked=${confirmed} counter=${count}`);
  if (confirmed !== 1 || count !== CAPACITY) {
    throw new Error('Check 2 FAILED: expected exactly one rebooking.');
  }
  console.log('[race]   PASS');
}

async function cleanup(): Promise<void> {
  await pool.query('DELETE FROM appointments WHERE slot_start = $1 AND slot_end = $2', [
    SLOT_START.toISOString(),
    SLOT_END.toISOString(),
  ]);
  await pool.query('DELETE FROM slot_capacity WHERE slot_start = $1 AND slot_end = $2', [
    SLOT_START.toISOString(),
    SLOT_END.toISOString(),
  ]);
}

async function main(): Promise<void> {
  try {
    const ids = await checkConcurrentReserves();
    await checkReleaseAndRebook(ids);
    console.log('\n[race] All checks passed.');
  } finally {
    await cleanup();
    await pool.end();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
