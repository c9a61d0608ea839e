// ============================================================
// Domain Events — Appointment Engine
//
// Emitted after a booking commits or is cancelled. Consumed by
// collaborators outside the engine (notifications, analytics).
// ============================================================

import type { Appointment } from './types.js';

// ── Event Name Union ────────────────────────────────────────

export type DomainEventName =
  | 'BookingConfirmed'
  | 'BookingCancelled';

// ── Event Payloads ──────────────────────────────────────────

export interface BookingConfirmedEvent {
  name: 'BookingConfirmed';
  appointment_id: string;
  appointment: Appointment;
  timestamp: string;
}

export interface BookingCancelledEvent {
  name: 'BookingCancelled';
  appointment_id: string;
  appointment: Appointment;
  timestamp: string;
}

// ── Discriminated Union ─────────────────────────────────────

export type DomainEvent =
  | BookingConfirmedEvent
  | BookingCancelledEvent;

// ── Helper: map event names to their payload types ──────────

export interface DomainEventMap {
  BookingConfirmed: BookingConfirmedEvent;
  BookingCancelled: BookingCancelledEvent;
}
