/**
 * Session error taxonomy
 *
 * Only ValidationError ever reaches a caller; the others are absorbed and
 * logged where they occur.
 */

import type { ZodIssue } from 'zod';

export type ValidationErrorCode = 'invalid_input' | 'unknown_participant';

/**
 * Malformed join/send/leave input, rejected at the boundary
 */
export class ValidationError extends Error {
  public readonly code: ValidationErrorCode;
  public readonly issues: ZodIssue[];

  constructor(message: string, code: ValidationErrorCode = 'invalid_input', issues: ZodIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.code = code;
    this.issues = issues;
  }

  /** HTTP status the routes answer with */
  get statusCode(): number {
    return this.code === 'unknown_participant' ? 403 : 400;
  }
}

/**
 * Both the primary and the backup content source failed for one turn
 */
export class TransientContentError extends Error {
  /** Failures in attempt order (primary first) */
  public readonly attempts: Error[];

  constructor(message: string, attempts: Error[]) {
    super(message);
    this.name = 'TransientContentError';
    this.attempts = attempts;
  }
}

/**
 * A bus listener's inbox overflowed and the listener was dropped
 */
export class CapacityError extends Error {
  public readonly listenerId: string;
  public readonly capacity: number;

  constructor(listenerId: string, capacity: number) {
    super(`Listener ${listenerId} inbox full (capacity ${capacity})`);
    this.name = 'CapacityError';
    this.listenerId = listenerId;
    this.capacity = capacity;
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
