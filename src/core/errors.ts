export type ErrorSeverity = 'critical' | 'error' | 'warning';

/**
 * Base error for everything the engine raises on purpose.
 * Code ranges:
 * - VenueError: 1000-1999
 * - ExecutionError: 2000-2999
 * - PositionMismatchError: 3000-3999
 * - ConfigValidationError: 4000-4999
 */
export abstract class SystemError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly severity: ErrorSeverity,
    public readonly metadata?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export type VenueErrorKind =
  | 'transient'
  | 'rejected'
  | 'unsupported'
  | 'auth'
  | 'validation'
  /** The call failed without an answer; a placement may or may not exist. */
  | 'ambiguous';

export const VENUE_ERROR_CODES = {
  TRANSIENT: 1001,
  REJECTED: 1002,
  UNSUPPORTED: 1003,
  UNAUTHORIZED: 1004,
  INVALID_REQUEST: 1005,
  AMBIGUOUS_OUTCOME: 1006
} as const;

const codeForKind = (kind: VenueErrorKind): number => {
  switch (kind) {
    case 'transient':
      return VENUE_ERROR_CODES.TRANSIENT;
    case 'rejected':
      return VENUE_ERROR_CODES.REJECTED;
    case 'unsupported':
      return VENUE_ERROR_CODES.UNSUPPORTED;
    case 'auth':
      return VENUE_ERROR_CODES.UNAUTHORIZED;
    case 'validation':
      return VENUE_ERROR_CODES.INVALID_REQUEST;
    case 'ambiguous':
      return VENUE_ERROR_CODES.AMBIGUOUS_OUTCOME;
  }
};

export class VenueError extends SystemError {
  constructor(
    public readonly kind: VenueErrorKind,
    message: string,
    public readonly venue: string,
    metadata?: Record<string, unknown>
  ) {
    super(
      codeForKind(kind),
      message,
      kind === 'auth' ? 'critical' : kind === 'transient' ? 'warning' : 'error',
      metadata
    );
  }
}

export const EXECUTION_ERROR_CODES = {
  HEDGE_FAILED: 2001,
  CLOSE_ATTEMPTS_EXHAUSTED: 2002,
  STOP_PRICE_REACHED: 2003,
  LIFECYCLE_FAILURE: 2004
} as const;

export class ExecutionError extends SystemError {
  constructor(
    code: number,
    message: string,
    severity: ErrorSeverity,
    metadata?: Record<string, unknown>
  ) {
    super(code, message, severity, metadata);
  }
}

export class PositionMismatchError extends SystemError {
  constructor(message: string, metadata: Record<string, unknown>) {
    super(3001, message, 'critical', metadata);
  }
}

/** Raised at startup; the engine cannot run on an invalid configuration. */
export class ConfigValidationError extends SystemError {
  constructor(message: string, public readonly validationErrors: string[]) {
    super(4010, message, 'critical', { validationErrors });
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
