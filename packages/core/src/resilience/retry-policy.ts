/**
 * Retry policy for fallible steps
 *
 * Classifies each failure before deciding whether to wait and try again.
 * Terminal failures surface after the first attempt; everything else is
 * retried with capped exponential backoff until maxAttempts is reached,
 * after which the last error is rethrown unchanged.
 */

import { DEFAULT_STEP_RETRY } from '../constants.js';
import {
  ShiftclockError,
  TransientError,
  errorMessage,
} from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import type { ErrorClassification, RetryConfig } from '../types/index.js';

/** Jitter spread either side of the computed delay */
const JITTER_RATIO = 0.25;

/** One line of attempt telemetry */
export interface RetryAttemptRecord {
  context: string;
  attempt: number;
  maxAttempts: number;
  /** Delay slept before this attempt */
  delayMs: number;
  outcome: 'success' | 'failure';
  classification?: ErrorClassification;
  error?: string;
}

export interface RetryPolicyOptions {
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  /** Uniform [0, 1) source for jitter */
  random?: () => number;
  onAttempt?: (record: RetryAttemptRecord) => void;
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Decide whether an error is worth retrying.
 *
 * Shiftclock errors carry their own kind; TypeError and RangeError point at
 * malformed input and are terminal; anything else is assumed transient.
 */
export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof ShiftclockError) {
    return error.kind === 'transient' ? 'transient' : 'terminal';
  }
  if (error instanceof TypeError || error instanceof RangeError) {
    return 'terminal';
  }
  return 'transient';
}

export class RetryPolicy {
  readonly config: Readonly<RetryConfig>;

  private readonly logger: Logger;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly onAttempt: ((record: RetryAttemptRecord) => void) | undefined;

  constructor(config?: Partial<RetryConfig>, options?: RetryPolicyOptions) {
    const merged = { ...DEFAULT_STEP_RETRY, ...config };
    if (!Number.isInteger(merged.maxAttempts) || merged.maxAttempts < 1) {
      throw new RangeError('maxAttempts must be an integer of at least 1');
    }
    if (merged.backoffBase < 1) {
      throw new RangeError('backoffBase must be at least 1');
    }

    this.config = Object.freeze(merged);
    this.logger = options?.logger ?? rootLogger.child('retry');
    this.sleepFn = options?.sleep ?? sleep;
    this.random = options?.random ?? Math.random;
    this.onAttempt = options?.onAttempt;
  }

  /**
   * Delay before attempt `attempt` (1-based), without jitter.
   * The first attempt never waits.
   */
  baseDelayFor(attempt: number): number {
    if (attempt <= 1) {
      return 0;
    }
    const exponential =
      this.config.baseDelayMs * Math.pow(this.config.backoffBase, attempt - 1);
    return Math.min(this.config.maxDelayMs, exponential);
  }

  /**
   * Delay before attempt `attempt`, jittered and honouring any Retry-After
   * hint on the previous error.
   */
  delayFor(attempt: number, previousError?: unknown): number {
    let delay = this.baseDelayFor(attempt);
    if (delay === 0) {
      return 0;
    }

    if (this.config.jitter) {
      const spread = (this.random() * 2 - 1) * JITTER_RATIO;
      delay += delay * spread;
    }

    if (previousError instanceof TransientError && previousError.retryAfterMs) {
      delay = Math.max(delay, Math.min(previousError.retryAfterMs, this.config.maxDelayMs));
    }

    return Math.max(0, Math.round(delay));
  }

  /**
   * Run an operation under this policy.
   *
   * @param operation - A single fallible step
   * @param context - Name used in log lines
   * @returns The operation's result
   * @throws The last error once attempts are exhausted, or the first terminal error
   */
  async execute<T>(operation: () => Promise<T>, context = 'operation'): Promise<T> {
    const { maxAttempts } = this.config;
    let lastError: unknown;
    let delayMs = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        delayMs = this.delayFor(attempt, lastError);
        this.logger.info('Waiting before retry', { context, attempt, maxAttempts, delayMs });
        await this.sleepFn(delayMs);
      }

      try {
        const result = await operation();
        this.record({ context, attempt, maxAttempts, delayMs, outcome: 'success' });
        if (attempt > 1) {
          this.logger.info('Operation succeeded after retry', { context, attempt });
        }
        return result;
      } catch (error) {
        lastError = error;
        const classification = classifyError(error);
        this.record({
          context,
          attempt,
          maxAttempts,
          delayMs,
          outcome: 'failure',
          classification,
          error: errorMessage(error),
        });

        if (classification === 'terminal') {
          this.logger.warn('Terminal error, not retrying', { context, attempt });
          throw error;
        }
      }
    }

    this.logger.warn('Retry attempts exhausted', { context, maxAttempts });
    throw lastError;
  }

  private record(record: RetryAttemptRecord): void {
    if (record.outcome === 'failure') {
      this.logger.warn('Attempt failed', { ...record });
    } else {
      this.logger.debug('Attempt succeeded', { ...record });
    }
    this.onAttempt?.(record);
  }
}
