/**
 * Error taxonomy for the scheduling engine
 *
 * Operational errors carry an HTTP status and a stable code that the error
 * middleware renders as `{ ok: false, error: { code, message, details } }`.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'SLOT_UNAVAILABLE'
  | 'TUTOR_CONFLICT'
  | 'NO_ELIGIBLE_TUTOR'
  | 'NOTIFICATION_FAILURE';

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly isOperational: boolean;
  readonly details?: unknown;

  constructor(message: string, code: ErrorCode, statusCode: number, isOperational = true, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;
  }
}

/** Malformed subject, date, slot token or management input. */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, true, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
  }
}

/** No eligible tutor remains for the requested slot. */
export class SlotUnavailableError extends AppError {
  constructor(message = 'That time is no longer available. Please pick another time.') {
    super(message, 'SLOT_UNAVAILABLE', 409);
  }
}

/** Lost the race to a concurrent booking even after retrying. */
export class TutorConflictError extends AppError {
  constructor(message = 'Someone else just booked that time. Please retry.') {
    super(message, 'TUTOR_CONFLICT', 409);
  }
}

/**
 * Raised when the fairness selector is handed an empty candidate set.
 * Callers check eligibility first, so reaching this is a bug.
 */
export class NoEligibleTutorError extends AppError {
  constructor() {
    super('Fairness selection requires at least one eligible tutor', 'NO_ELIGIBLE_TUTOR', 500, false);
  }
}

/** SMS delivery failed. Logged and reported as a warning, never thrown out of a booking. */
export class NotificationFailure extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'NOTIFICATION_FAILURE', 502, true, details);
  }
}
