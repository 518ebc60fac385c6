/**
 * Circuit breaker for repeated action runs
 *
 * Decides whether a guarded operation is attempted at all across separate
 * invocations over time. Implements the standard three-state pattern:
 *
 * - **Closed**: Calls pass through normally. Consecutive failures are counted.
 * - **Open**: Calls are refused. After the recovery timeout, transitions to
 *   half-open.
 * - **Half-open**: A single probe call is allowed through.
 *   If it succeeds, the breaker closes. If it fails, it re-opens.
 */

import { CIRCUIT } from '../constants.js';
import { CircuitBreakerOpenError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import type { CircuitBreakerState } from '../types/index.js';

/** Configuration options for the circuit breaker */
export interface CircuitBreakerOptions {
  /** Human-readable name of the protected service (for logging) */
  serviceName?: string;
  /** Number of consecutive failures before opening the breaker */
  failureThreshold?: number;
  /** Time in ms after the last failure before a probe is allowed */
  recoveryTimeoutMs?: number;
  /** Decides whether a failure counts toward the threshold */
  shouldCount?: (error: unknown) => boolean;
  onStateChange?: (from: CircuitBreakerState, to: CircuitBreakerState) => void;
  logger?: Logger;
  /** Clock, Date.now unless replaced */
  now?: () => number;
}

/**
 * Usage:
 * ```typescript
 * const breaker = new CircuitBreaker({ serviceName: 'portal' });
 * if (breaker.canExecute()) {
 *   try {
 *     await runAction();
 *     breaker.recordSuccess();
 *   } catch (error) {
 *     breaker.recordFailure(error);
 *   }
 * }
 * ```
 */
export class CircuitBreaker {
  private failures = 0;
  private lastFailureTime = 0;
  private state: CircuitBreakerState = 'closed';
  /** Set once the half-open probe has been handed out */
  private probeIssued = false;

  private readonly serviceName: string;
  private readonly failureThreshold: number;
  private readonly recoveryTimeoutMs: number;
  private readonly shouldCount: (error: unknown) => boolean;
  private readonly onStateChange:
    | ((from: CircuitBreakerState, to: CircuitBreakerState) => void)
    | undefined;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options?: CircuitBreakerOptions) {
    this.serviceName = options?.serviceName ?? 'unknown';
    this.failureThreshold = options?.failureThreshold ?? CIRCUIT.FAILURE_THRESHOLD;
    this.recoveryTimeoutMs = options?.recoveryTimeoutMs ?? CIRCUIT.RECOVERY_TIMEOUT_MS;
    this.shouldCount = options?.shouldCount ?? (() => true);
    this.onStateChange = options?.onStateChange;
    this.logger = (options?.logger ?? rootLogger).child('circuit-breaker', {
      service: this.serviceName,
    });
    this.now = options?.now ?? (() => Date.now());

    if (!Number.isInteger(this.failureThreshold) || this.failureThreshold < 1) {
      throw new RangeError('failureThreshold must be an integer of at least 1');
    }
  }

  /**
   * Whether the guarded operation may run now.
   *
   * In half-open this returns true exactly once; further calls return false
   * until the probe's result is recorded.
   */
  canExecute(): boolean {
    if (this.state === 'closed') {
      return true;
    }

    if (this.state === 'open') {
      if (this.remainingCooldown() > 0) {
        return false;
      }
      this.transition('half-open');
    }

    if (this.probeIssued) {
      return false;
    }
    this.probeIssued = true;
    return true;
  }

  /**
   * Handle a successful call. Only a half-open probe closes the breaker;
   * a success reported while open is ignored.
   */
  recordSuccess(): void {
    if (this.state === 'open') {
      return;
    }
    this.failures = 0;
    this.probeIssued = false;
    if (this.state === 'half-open') {
      this.transition('closed');
    }
  }

  /** Handle a failed call */
  recordFailure(error?: unknown): void {
    if (!this.shouldCount(error)) {
      // An uncounted failure still ends a half-open probe
      if (this.state === 'half-open') {
        this.probeIssued = false;
      }
      return;
    }

    this.failures++;
    this.lastFailureTime = this.now();

    if (this.state === 'half-open') {
      this.probeIssued = false;
      this.transition('open');
      return;
    }

    if (this.state === 'closed' && this.failures >= this.failureThreshold) {
      this.transition('open');
    }
  }

  /**
   * Execute a function through the circuit breaker.
   *
   * @param fn - The async function to protect
   * @returns The result of the function
   * @throws {CircuitBreakerOpenError} if the breaker refuses the call
   * @throws The original error if the function fails
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.canExecute()) {
      throw new CircuitBreakerOpenError(this.serviceName, this.remainingCooldown());
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }
  }

  /** Get the current breaker state (for monitoring/health checks) */
  getState(): CircuitBreakerState {
    // Re-evaluate open -> half-open transition on read
    if (this.state === 'open' && this.remainingCooldown() === 0) {
      return 'half-open';
    }
    return this.state;
  }

  /** Get the current consecutive failure count */
  getFailureCount(): number {
    return this.failures;
  }

  /** Milliseconds until an open breaker allows a probe, 0 otherwise */
  remainingCooldown(): number {
    if (this.state !== 'open') {
      return 0;
    }
    const elapsed = this.now() - this.lastFailureTime;
    return Math.max(0, this.recoveryTimeoutMs - elapsed);
  }

  /**
   * Operator override: force the breaker closed from any state. Not a state
   * machine transition, so onStateChange is not called.
   */
  reset(): void {
    const from = this.state;
    this.failures = 0;
    this.lastFailureTime = 0;
    this.probeIssued = false;
    this.state = 'closed';
    this.logger.info('Circuit reset', { from });
  }

  private transition(to: CircuitBreakerState): void {
    const from = this.state;
    this.state = to;
    if (to === 'open') {
      this.logger.warn('Circuit opened', {
        failures: this.failures,
        recoveryTimeoutMs: this.recoveryTimeoutMs,
      });
    } else {
      this.logger.info('Circuit state changed', { from, to });
    }
    this.onStateChange?.(from, to);
  }
}
