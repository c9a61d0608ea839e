// ============================================================
// Clock Service — Centralized Time Source
// ============================================================
// Provides a single source of "now" for the engine. Slot
// generation, lead-time checks and booking timestamps all read
// from here instead of new Date() / Date.now().
//
// Supports:
//  - Test injection via overrideNow() / resetClock()
//  - Raw UTC now via getNowUTC()
// ============================================================

export type NowProvider = () => Date;

let _nowProvider: NowProvider = () => new Date();

// ── Public API ──────────────────────────────────────────────

/**
 * Get the current time as a Date in UTC.
 * Respects any test override set via overrideNow().
 */
export function getNowUTC(): Date {
  return _nowProvider();
}

// ── Test Helpers ────────────────────────────────────────────

/**
 * Override the clock for testing.
 *
 * @example
 *   overrideNow(() => new Date('2026-02-08T12:00:00Z'));
 *   // ... run tests ...
 *   resetClock();
 */
export function overrideNow(provider: NowProvider): void {
  _nowProvider = provider;
}

/**
 * Reset the clock to use the real system time.
 */
export function resetClock(): void {
  _nowProvider = () => new Date();
}
