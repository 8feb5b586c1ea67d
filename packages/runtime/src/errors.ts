// Runtime error types
//
// Permission resolution and hierarchy comparison never throw: absent entities
// are ordinary results. These errors cover caller mistakes at the edges.

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or contradictory input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when a partial member's embedded user does not match the user ID it
 * was passed with.
 */
export class MemberMismatchError extends ValidationError {
  readonly expectedUserId: bigint;
  readonly actualUserId: bigint;

  constructor(expectedUserId: bigint, actualUserId: bigint) {
    super(
      `Partial member belongs to user ${actualUserId}, expected user ${expectedUserId}`,
      {
        field: 'user.id',
        details: {
          expectedUserId: expectedUserId.toString(),
          actualUserId: actualUserId.toString(),
        },
      }
    );
    this.name = 'MemberMismatchError';
    this.expectedUserId = expectedUserId;
    this.actualUserId = actualUserId;
  }
}
