// ============================================================
// Error Handler — EngineError → HTTP response
//
//   EngineError        → its status, {error: code, message, suggestion?, details?}
//   Fastify 4xx        → same status, VALIDATION_ERROR / BAD_REQUEST
//   anything else      → 500 INTERNAL_ERROR (logged, message hidden)
// ============================================================

import type { FastifyError, FastifyInstance } from 'fastify';
import { z } from 'zod';
import { EngineError, ValidationError } from '../domain/errors.js';

export interface ErrorBody {
  error: string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

export function toErrorBody(err: EngineError): ErrorBody {
  const body: ErrorBody = { error: err.code, message: err.message };
  if ('suggestion' in err && typeof err.suggestion === 'string') body.suggestion = err.suggestion;
  if (err.details) body.details = err.details;
  return body;
}

/**
 * Parse untrusted input with a zod schema, or throw ValidationError
 * listing each failing field.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}.`, {
      issues: result.error.issues.map((issue) => ({
        field: issue.path.join('.') || null,
        message: issue.message,
      })),
    });
  }
  return result.data;
}

function isFastifyError(err: unknown): err is FastifyError {
  return err instanceof Error && 'statusCode' in err && typeof err.statusCode === 'number';
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, request, reply) => {
    if (err instanceof EngineError) {
      request.log.info({ code: err.code }, err.message);
      return reply.code(err.status).send(toErrorBody(err));
    }

    // Malformed JSON, body too large, bad content type, etc.
    if (isFastifyError(err) && err.statusCode !== undefined && err.statusCode < 500) {
      return reply.code(err.statusCode).send({
        error: err.validation ? 'VALIDATION_ERROR' : 'BAD_REQUEST',
        message: err.message,
      } satisfies ErrorBody);
    }

    request.log.error({ err }, 'Unhandled error');
    return reply.code(500).send({
      error: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred.',
    } satisfies ErrorBody);
  });
}
