/**
 * Application constants
 */

import type { ActionVocabulary, RetryConfig } from './types/index.js';

/** Retry configuration for authentication and navigation */
export const DEFAULT_STEP_RETRY: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffBase: 2,
  jitter: true,
};

/** The real click is issued once unless configured otherwise */
export const DEFAULT_ACTION_RETRY: RetryConfig = {
  maxAttempts: 1,
  baseDelayMs: 1000,
  maxDelayMs: 1000,
  backoffBase: 1,
  jitter: false,
};

/** Status reads are retried briefly, never indefinitely */
export const DEFAULT_STATUS_RETRY: RetryConfig = {
  maxAttempts: 2,
  baseDelayMs: 500,
  maxDelayMs: 2000,
  backoffBase: 2,
  jitter: false,
};

/** Webhook and e-mail delivery */
export const DEFAULT_NOTIFICATION_RETRY: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10_000,
  backoffBase: 2,
  jitter: false,
};

/** Verification polling */
export const VERIFICATION = {
  POLL_INTERVAL_MS: 500,
  TIMEOUT_MS: 10_000,
} as const;

/** Circuit breaker defaults for scheduled runs */
export const CIRCUIT = {
  FAILURE_THRESHOLD: 5,
  RECOVERY_TIMEOUT_MS: 60_000,
} as const;

/** Scheduler defaults */
export const SCHEDULE = {
  HEARTBEAT_INTERVAL_MS: 5 * 60 * 1000,
  MISFIRE_GRACE_MS: 30_000,
} as const;

/** Minimum spacing between two requests to the same notification channel */
export const DEFAULT_MIN_REQUEST_INTERVAL_MS = 1000;

/** Per-request timeout for webhook calls */
export const DEFAULT_WEBHOOK_TIMEOUT_MS = 30_000;

/** Operator confirmation tokens */
export const CONFIRMATION = {
  AFFIRMATIVE: 'yes',
  QUIT: ['q', 'quit'],
} as const;

export const DEFAULT_VOCABULARY: ActionVocabulary = {
  enter: ['clock in', 'clock-in', 'clocked in', 'sign in', 'signed in', 'check in', 'checked in'],
  exit: ['clock out', 'clock-out', 'clocked out', 'sign out', 'signed out', 'check out', 'checked out'],
  shared: ['punch', 'attendance', 'timesheet'],
};

export const SUCCESS_KEYWORDS = /\b(success|successful|successfully|recorded|completed|done)\b/i;

export const FAILURE_KEYWORDS = /\b(fail|failed|failure|error|denied|rejected|unable)\b/i;
