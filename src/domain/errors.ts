// ============================================================
// Engine Errors
//
// Every failure the engine surfaces carries a stable `code` and
// an HTTP status. Booking failures also carry a `suggestion` so
// callers can tell "refresh" from "pick another" from "later".
// ============================================================

export type BookingSuggestion =
  | 'refresh_availability'
  | 'choose_another_time'
  | 'choose_later_time';

export abstract class EngineError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

export class ValidationError extends EngineError {
  readonly code = 'VALIDATION_ERROR';
  readonly status = 400;
}

export class ConfigurationError extends EngineError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly status = 400;
}

export class InvalidRuleError extends EngineError {
  readonly code = 'INVALID_RULE';
  readonly status = 400;
}

export class RuleConflictError extends EngineError {
  readonly code = 'RULE_CONFLICT';
  readonly status = 409;
}

export class DuplicateExceptionError extends EngineError {
  readonly code = 'DUPLICATE_EXCEPTION';
  readonly status = 409;
}

export class NotFoundError extends EngineError {
  readonly code = 'NOT_FOUND';
  readonly status = 404;
}

export class SlotUnavailableError extends EngineError {
  readonly code = 'SLOT_UNAVAILABLE';
  readonly status = 409;
  readonly suggestion: BookingSuggestion = 'refresh_availability';
}

export class SlotExpiredError extends EngineError {
  readonly code = 'SLOT_EXPIRED';
  readonly status = 422;
  readonly suggestion: BookingSuggestion = 'choose_later_time';
}

export class SlotFullError extends EngineError {
  readonly code = 'SLOT_FULL';
  readonly status = 409;
  readonly suggestion: BookingSuggestion = 'choose_another_time';
}

export class AlreadyCancelledError extends EngineError {
  readonly code = 'ALREADY_CANCELLED';
  readonly status = 409;
}

/** Raised by the public booking routes' rate limiter. */
export class RateLimitedError extends EngineError {
  readonly code = 'RATE_LIMITED';
  readonly status = 429;
}
