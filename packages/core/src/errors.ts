/**
 * Error taxonomy
 *
 * Every failure raised by shiftclock code extends ShiftclockError and carries
 * a `kind` the retry policy and the orchestrator branch on:
 *
 * - terminal: retrying cannot help (rejected credentials, malformed data)
 * - transient: network, timeout and driver failures; retried
 * - ambiguous: verification could not decide; reported, not retried
 * - cancelled: the operator declined or aborted; becomes a simulation
 */

export type ShiftclockErrorKind = 'terminal' | 'transient' | 'ambiguous' | 'cancelled';

export abstract class ShiftclockError extends Error {
  abstract readonly kind: ShiftclockErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TerminalError extends ShiftclockError {
  readonly kind = 'terminal' as const;
}

/** The remote surface refused the supplied credentials */
export class CredentialsRejectedError extends TerminalError {}

/** Configuration failed validation */
export class ConfigurationError extends TerminalError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

/** A status read returned data that does not fit the snapshot shape */
export class MalformedStatusError extends TerminalError {}

export class TransientError extends ShiftclockError {
  readonly kind = 'transient' as const;

  constructor(
    message: string,
    options?: { cause?: unknown; retryAfterMs?: number }
  ) {
    super(message, options);
    this.retryAfterMs = options?.retryAfterMs;
  }

  /** Server-requested minimum wait before the next attempt */
  readonly retryAfterMs: number | undefined;
}

/** Any failure inside the session driver */
export class DriverError extends TransientError {
  constructor(
    public readonly operation: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${operation}: ${message}`, options);
  }
}

/** A notification channel answered with a retryable failure */
export class NotificationDeliveryError extends TransientError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown; retryAfterMs?: number }
  ) {
    super(message, options);
  }
}

/** A notification channel answered with a failure retrying cannot fix */
export class NotificationRejectedError extends TerminalError {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
  }
}

export class VerificationAmbiguousError extends ShiftclockError {
  readonly kind = 'ambiguous' as const;
}

export class UserCancelledError extends ShiftclockError {
  readonly kind = 'cancelled' as const;

  constructor(message = 'cancelled by operator') {
    super(message);
  }
}

/** Error thrown when the circuit breaker is open */
export class CircuitBreakerOpenError extends TerminalError {
  constructor(
    public readonly serviceName: string,
    public readonly retryAfterMs: number
  ) {
    super(
      `Circuit breaker open for ${serviceName}. ` +
        `Retry after ${Math.ceil(retryAfterMs / 1000)}s.`
    );
  }
}

/** Normalise an unknown thrown value to a message */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Normalise an unknown thrown value to an Error */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
