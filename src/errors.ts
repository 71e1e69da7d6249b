/**
 * Errors surfaced to callers of input requests.
 * Parse failures are not errors: they are handled inside the retry loop.
 */

import type { ParseFailure } from './types.js';

export type StreamErrorKind = 'end_of_input' | 'io_failure';

/**
 * The line source ended or failed. Never retried.
 */
export class StreamError extends Error {
  readonly kind: StreamErrorKind;

  constructor(kind: StreamErrorKind, message?: string, options?: { cause?: unknown }) {
    super(message ?? (kind === 'end_of_input' ? 'End of input reached' : 'Failed to read input'), options);
    this.name = 'StreamError';
    this.kind = kind;
  }
}

/**
 * A request configured with maxAttempts ran out of attempts
 */
export class AttemptsExhaustedError extends Error {
  readonly attempts: number;
  readonly lastFailure: ParseFailure;

  constructor(attempts: number, lastFailure: ParseFailure) {
    super(`No valid ${lastFailure.expected} after ${attempts} attempts`);
    this.name = 'AttemptsExhaustedError';
    this.attempts = attempts;
    this.lastFailure = lastFailure;
  }
}

/**
 * Coerce anything a line source rejected with into a StreamError
 */
export function toStreamError(err: unknown): StreamError {
  if (err instanceof StreamError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new StreamError('io_failure', message, { cause: err });
}
