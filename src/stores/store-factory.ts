// ============================================================
// Store Factory — resolves the persistence backend
//
//   STORE_MODE=postgres → repos/*.repo.ts (default)
//   STORE_MODE=memory   → stores/memory-*.ts (demo, tests)
//
// The Postgres repos are imported lazily so memory mode never
// opens a pool.
// ============================================================

import type { EngineStores } from '../domain/interfaces.js';
import { InMemoryAuditLog, InMemoryBookingStore } from './memory-booking-store.js';
import {
  InMemoryAvailabilityRuleRepository,
  InMemoryConfigurationRepository,
  InMemoryExceptionDateRepository,
} from './memory-scheduling-store.js';

export type StoreMode = 'postgres' | 'memory';

export function createMemoryStores(): EngineStores {
  return {
    configuration: new InMemoryConfigurationRepository(),
    rules: new InMemoryAvailabilityRuleRepository(),
    exceptions: new InMemoryExceptionDateRepository(),
    bookings: new InMemoryBookingStore(),
    audit: new InMemoryAuditLog(),
  };
}

export async function createPostgresStores(): Promise<EngineStores> {
  const [
    { configurationRepo },
    { availabilityRuleRepo },
    { exceptionDateRepo },
    { appointmentRepo },
    { auditRepo },
  ] = await Promise.all([
    import('../repos/configuration.repo.js'),
    import('../repos/availability-rule.repo.js'),
    import('../repos/exception-date.repo.js'),
    import('../repos/appointment.repo.js'),
    import('../repos/audit.repo.js'),
  ]);

  return {
    configuration: configurationRepo,
    rules: availabilityRuleRepo,
    exceptions: exceptionDateRepo,
    bookings: appointmentRepo,
    audit: auditRepo,
  };
}

export async function createStores(mode: StoreMode): Promise<EngineStores> {
  return mode === 'memory' ? createMemoryStores() : createPostgresStores();
}
