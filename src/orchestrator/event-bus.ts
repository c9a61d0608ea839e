// ============================================================
// Event Bus — Typed, In-Process Domain Event Dispatcher
//
// Features:
//   - Strongly typed via DomainEventMap
//   - Auto-audit: every emitted event → the injected AuditSink
//   - Async subscribers (errors are caught, logged, never crash)
//   - Introspection: listenerCount(), getRecentEvents()
// ============================================================

import { EventEmitter } from 'node:events';
import type { DomainEvent, DomainEventName, DomainEventMap } from '../domain/events.js';
import type { AuditSink } from '../domain/interfaces.js';

type EventHandler<E extends DomainEvent> = (event: E) => void | Promise<void>;

export interface RecentEvent {
  name: DomainEventName;
  appointment_id: string;
  timestamp: string;
}

export class DomainEventBus {
  private emitter = new EventEmitter();
  private recentEvents: RecentEvent[] = [];
  private maxRecentEvents = 200;

  constructor(private readonly audit?: AuditSink) {
    this.emitter.setMaxListeners(50);
  }

  /**
   * Subscribe to a domain event.
   * Handler errors are caught and logged; they never reach the emitter.
   */
  on<K extends DomainEventName>(
    eventName: K,
    handler: EventHandler<DomainEventMap[K]>,
  ): void {
    this.emitter.on(eventName, async (event: DomainEventMap[K]) => {
      try {
        await handler(event);
      } catch (err) {
        console.error(`[event-bus] Handler error for ${eventName}:`, err);
      }
    });
  }

  /**
   * Emit a domain event. Writes an audit entry first when a sink
   * was supplied; an audit failure is logged and dispatch continues.
   */
  async emit(event: DomainEvent): Promise<void> {
    this.recentEvents.push({
      name: event.name,
      appointment_id: event.appointment_id,
      timestamp: event.timestamp,
    });
    if (this.recentEvents.length > this.maxRecentEvents) {
      this.recentEvents.shift();
    }

    if (this.audit) {
      try {
        await this.audit.log({
          event_type: `domain.${event.name}`,
          entity_type: 'appointment',
          entity_id: event.appointment_id,
          actor: 'event_bus',
          payload: {
            reference_code: event.appointment.reference_code,
            slot_start: event.appointment.slot_start.toISOString(),
            slot_end: event.appointment.slot_end.toISOString(),
            status: event.appointment.status,
          },
        });
      } catch (err) {
        console.error(`[event-bus] Audit log failed for ${event.name}:`, err);
      }
    }

    this.emitter.emit(event.name, event);
  }

  listenerCount(eventName: DomainEventName): number {
    return this.emitter.listenerCount(eventName);
  }

  /** Recent event log, oldest first. */
  getRecentEvents(): RecentEvent[] {
    return [...this.recentEvents];
  }

  /**
   * Remove all listeners. Used in tests and shutdown.
   */
  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
