// ============================================================
// Engine — wires stores, services and the event bus together
//
// One engine per process. The HTTP layer and scripts receive it
// already built; tests build their own over in-memory stores.
// ============================================================

import type { EngineStores } from './domain/interfaces.js';
import type { ConfigurationFields } from './domain/types.js';
import { DomainEventBus } from './orchestrator/event-bus.js';
import { AvailabilityRuleService } from './services/availability-rule.service.js';
import { BookingLedger } from './services/booking-ledger.service.js';
import type { NowProvider } from './services/clock.js';
import { ConfigurationService, DEFAULT_CONFIGURATION } from './services/configuration.service.js';
import { ExceptionCalendarService } from './services/exception-calendar.service.js';
import { AppointmentScheduler } from './services/scheduler.service.js';

export interface EngineOptions {
  stores: EngineStores;
  clock?: NowProvider;
  eventBus?: DomainEventBus;
  defaults?: ConfigurationFields;
  maxWindowDays?: number;
}

export interface Engine {
  configuration: ConfigurationService;
  rules: AvailabilityRuleService;
  exceptions: ExceptionCalendarService;
  ledger: BookingLedger;
  scheduler: AppointmentScheduler;
  eventBus: DomainEventBus;
}

export function createEngine(options: EngineOptions): Engine {
  const { stores, clock, maxWindowDays } = options;
  const eventBus = options.eventBus ?? new DomainEventBus(stores.audit);

  const configuration = new ConfigurationService(
    stores.configuration,
    stores.audit,
    options.defaults ?? DEFAULT_CONFIGURATION,
  );
  const rules = new AvailabilityRuleService(stores.rules, stores.audit);
  const exceptions = new ExceptionCalendarService(stores.exceptions, stores.audit);
  const ledger = new BookingLedger({
    store: stores.bookings,
    configuration,
    rules,
    exceptions,
    eventBus,
    clock,
  });
  const scheduler = new AppointmentScheduler({
    configuration,
    rules,
    exceptions,
    ledger,
    clock,
    maxWindowDays,
  });

  return { configuration, rules, exceptions, ledger, scheduler, eventBus };
}
