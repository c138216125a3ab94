/**
 * Rate Limiter Error Class Hierarchy
 *
 * Every error the limiter raises maps to a status code and a
 * machine-readable code so that a host service can render it.
 *
 * Only RateLimitError is meant to reach callers. StoreUnavailableError is
 * absorbed by the limiter (failover to the memory store), and
 * PolicyNotFoundError / ConfigurationError are startup faults.
 *
 * ## Usage
 *
 * ```typescript
 * if (error instanceof ApiError) {
 *   res.status(error.statusCode).json(error.toResponse());
 * }
 * ```
 */

export interface ApiErrorResponse {
  error: string;
  code: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

export const ErrorCodes = {
  // Quota exhausted (429)
  RATE_LIMITED: 'RATE_LIMITED',

  // Startup / configuration faults (500)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  POLICY_NOT_FOUND: 'POLICY_NOT_FOUND',
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',

  // Counter backend unreachable (503)
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for everything the limiter throws
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;
  readonly timestamp: Date;
  readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number,
    code: ErrorCode,
    details?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  toResponse(): ApiErrorResponse {
    return {
      error: this.name.replace('Error', ''),
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
    };
  }

  static isApiError(error: unknown): error is ApiError {
    return error instanceof ApiError;
  }
}

// =============================================================================
// Quota Errors (429)
// =============================================================================

export class RateLimitError extends ApiError {
  readonly retryAfter: number;

  constructor(
    retryAfter: number,
    message: string = 'Too many requests. Please try again later.',
    details?: Record<string, unknown>
  ) {
    super(message, 429, ErrorCodes.RATE_LIMITED, { ...details, retryAfter });
    this.retryAfter = retryAfter;
  }
}

// =============================================================================
// Internal Errors (500)
// =============================================================================

export class InternalError extends ApiError {
  constructor(
    message: string = 'An unexpected error occurred',
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    isOperational: boolean = false
  ) {
    super(message, 500, code, details, isOperational);
  }
}

/**
 * A tier has no policy and there is no default to fall back on
 */
export class PolicyNotFoundError extends InternalError {
  readonly tier: string;

  constructor(tier: string) {
    super(`No rate limit policy for tier "${tier}"`, ErrorCodes.POLICY_NOT_FOUND, { tier });
    this.tier = tier;
  }
}

export class ConfigurationError extends InternalError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(
      `Configuration validation failed: ${issues.join('; ')}`,
      ErrorCodes.INVALID_CONFIGURATION,
      { issues }
    );
    this.issues = issues;
  }
}

// =============================================================================
// Service Unavailable Errors (503)
// =============================================================================

export class ServiceUnavailableError extends ApiError {
  constructor(
    message: string = 'Service temporarily unavailable',
    code: ErrorCode = ErrorCodes.SERVICE_UNAVAILABLE,
    details?: Record<string, unknown>
  ) {
    super(message, 503, code, details, true);
  }
}

/**
 * Transport failure talking to the distributed counter store
 */
export class StoreUnavailableError extends ServiceUnavailableError {
  readonly backend: string;

  constructor(backend: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause);
    super(
      reason ? `Counter store "${backend}" unavailable: ${reason}` : `Counter store "${backend}" unavailable`,
      ErrorCodes.STORE_UNAVAILABLE,
      { backend }
    );
    this.backend = backend;
    this.cause = cause;
  }
}
