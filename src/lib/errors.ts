export type ErrorCode =
  | 'internal_error'
  | 'not_found'
  | 'conflict'
  | 'validation_error'
  | 'sandbox_expired'
  | 'sandbox_ttl_infinite'
  | 'session_not_ready'
  | 'invalid_transition'
  | 'capability_not_supported'
  | 'timeout'
  | 'driver_error';

export type ErrorDetails = Record<string, string | number | boolean | null | string[]>;

export interface ErrorBody {
  error: {
    code: ErrorCode;
    message: string;
    details?: ErrorDetails;
  };
}

/**
 * Base error for everything surfaced to callers. `code` is stable and machine-readable;
 * `statusCode` is the HTTP status an API layer should answer with.
 */
export class ShoalError extends Error {
  readonly code: ErrorCode = 'internal_error';
  readonly statusCode: number = 500;
  readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }

  toJSON(): ErrorBody {
    const body: ErrorBody = { error: { code: this.code, message: this.message } };
    if (Object.keys(this.details).length > 0) {
      body.error.details = this.details;
    }
    return body;
  }
}

export class NotFoundError extends ShoalError {
  override readonly code = 'not_found';
  override readonly statusCode = 404;
}

export class ConflictError extends ShoalError {
  override readonly code = 'conflict';
  override readonly statusCode = 409;
}

export class ValidationError extends ShoalError {
  override readonly code = 'validation_error';
  override readonly statusCode = 400;
}

export class SandboxExpiredError extends ShoalError {
  override readonly code = 'sandbox_expired';
  override readonly statusCode = 409;

  constructor(sandboxId: string, expiresAt: Date) {
    super(`Sandbox ${sandboxId} expired at ${expiresAt.toISOString()}`, {
      sandbox_id: sandboxId,
      expires_at: expiresAt.toISOString(),
    });
  }
}

export class SandboxTtlInfiniteError extends ShoalError {
  override readonly code = 'sandbox_ttl_infinite';
  override readonly statusCode = 409;

  constructor(sandboxId: string) {
    super(`Sandbox ${sandboxId} has no TTL to extend`, { sandbox_id: sandboxId });
  }
}

export class SessionNotReadyError extends ShoalError {
  override readonly code = 'session_not_ready';
  override readonly statusCode = 503;
  readonly retryAfterMs: number;

  constructor(sandboxId: string, retryAfterMs: number, message = 'Session is starting') {
    super(message, { sandbox_id: sandboxId, retry_after_ms: retryAfterMs });
    this.retryAfterMs = retryAfterMs;
  }
}

export class InvalidTransitionError extends ShoalError {
  override readonly code = 'invalid_transition';
  override readonly statusCode = 409;
}

export class CapabilityNotSupportedError extends ShoalError {
  override readonly code = 'capability_not_supported';
  override readonly statusCode = 400;

  constructor(capability: string, available: string[]) {
    super(`Runtime does not support capability: ${capability}`, { capability, available });
  }
}

export class TimeoutError extends ShoalError {
  override readonly code = 'timeout';
  override readonly statusCode = 504;
}

export class DriverError extends ShoalError {
  override readonly code = 'driver_error';
  override readonly statusCode = 502;
}

/**
 * Wraps anything thrown by an external dependency as a DriverError, keeping typed errors as-is.
 */
export function asDriverError(err: unknown, operation: string): ShoalError {
  if (err instanceof ShoalError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new DriverError(`Driver ${operation} failed: ${message}`, { operation });
}
