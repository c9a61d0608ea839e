/**
 * Shared helper: an engine over fresh in-memory stores.
 *
 * Defaults are test-friendly (UTC, 60-min slots, capacity 2,
 * 60-min lead) and can be overridden per test. Time is frozen by
 * the caller with overrideNow().
 */

import type { EngineStores } from '../../src/domain/interfaces.js';
import type { ConfigurationFields } from '../../src/domain/types.js';
import { createEngine, type Engine } from '../../src/engine.js';
import { InMemoryAuditLog, InMemoryBookingStore } from '../../src/stores/memory-booking-store.js';
import {
  InMemoryAvailabilityRuleRepository,
  InMemoryConfigurationRepository,
  InMemoryExceptionDateRepository,
} from '../../src/stores/memory-scheduling-store.js';

/** Sunday 2026-03-01 12:00 UTC. 2026-03-02 is a Monday. */
export const FROZEN_NOW = new Date('2026-03-01T12:00:00.000Z');

export const TEST_DEFAULTS: ConfigurationFields = {
  slot_duration_minutes: 60,
  max_appointments_per_slot: 2,
  timezone: 'UTC',
  min_booking_lead_minutes: 60,
};

export interface TestEngine {
  engine: Engine;
  audit: InMemoryAuditLog;
  bookings: InMemoryBookingStore;
}

export function createTestEngine(overrides: Partial<ConfigurationFields> = {}): TestEngine {
  const audit = new InMemoryAuditLog();
  const bookings = new InMemoryBookingStore();
  const stores: EngineStores = {
    configuration: new InMemoryConfigurationRepository(),
    rules: new InMemoryAvailabilityRuleRepository(),
    exceptions: new InMemoryExceptionDateRepository(),
    bookings,
    audit,
  };
  const engine = createEngine({
    stores,
    defaults: { ...TEST_DEFAULTS, ...overrides },
    maxWindowDays: 31,
  });
  return { engine, audit, bookings };
}
