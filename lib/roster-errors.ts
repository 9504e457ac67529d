/**
 * @fileoverview Error taxonomy for roster operations.
 *
 * Every rejected operation leaves the roster in its last-known-good state;
 * the session provider turns these into user-visible notices.
 *
 * @module lib/roster-errors
 */

export type RosterErrorCode = 'VALIDATION' | 'NOT_FOUND' | 'INTEGRITY' | 'PARSE';

export abstract class RosterError extends Error {
  abstract readonly code: RosterErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A required field is missing or empty, or would break identity uniqueness. */
export class ValidationError extends RosterError {
  readonly code = 'VALIDATION';

  constructor(message: string, readonly fields: string[] = []) {
    super(message);
  }
}

/** An identity lookup matched no row. */
export class NotFoundError extends RosterError {
  readonly code = 'NOT_FOUND';

  constructor(message: string, readonly identity: string | null = null) {
    super(message);
  }
}

/** A post-mutation invariant failed; the change was not committed. */
export class IntegrityError extends RosterError {
  readonly code = 'INTEGRITY';

  constructor(
    message: string,
    readonly expected: number | null = null,
    readonly actual: number | null = null,
  ) {
    super(message);
  }
}

/** The uploaded file could not be read. Not retried; the user re-uploads. */
export class ParseError extends RosterError {
  readonly code = 'PARSE';

  constructor(message: string, readonly fileName: string | null = null) {
    super(message);
  }
}

export function isRosterError(error: unknown): error is RosterError {
  return error instanceof RosterError;
}

/** Display text for any thrown value. */
export function toUserMessage(error: unknown): string {
  if (isRosterError(error)) return error.message;
  if (error instanceof Error && error.message) return `Unexpected error: ${error.message}`;
  if (typeof error === 'string' && error) return error;
  return 'Unexpected error';
}
