/**
 * Shared types for the runner
 */

import type {
  CircuitBreakerState,
  Credentials,
  LogLevel,
  NextRun,
  NotificationSettings,
  RetryConfig,
  ScheduleConfig,
  SchedulerSnapshot,
  SurfaceProfile,
} from '@shiftclock/core';

/** Where the portal credentials come from */
export type CredentialSource =
  | { kind: 'env'; credentials: Credentials }
  | { kind: 'secret'; secretId: string };

export interface BrowserConfig {
  /** Attach to a running Chromium over CDP instead of launching one */
  cdpEndpoint?: string;
  executablePath?: string;
  headless: boolean;
  screenshotDir: string;
  geolocation?: { latitude: number; longitude: number };
}

/**
 * Fully validated runner configuration
 */
export interface RunnerConfig {
  environment: string;
  logLevel: LogLevel;
  schedule: ScheduleConfig;
  retry: RetryConfig;
  verificationTimeoutMs: number;
  circuit: { failureThreshold: number; recoveryTimeoutMs: number };
  credentials: CredentialSource;
  surface: SurfaceProfile;
  notifications: NotificationSettings;
  browser: BrowserConfig;
  metricsEnabled: boolean;
}

/**
 * Output from the heartbeat handler
 */
export interface HeartbeatOutput {
  /** Heartbeat id for tracking */
  heartbeatId: string;
  timestamp: string;
  running: boolean;
  circuitState: CircuitBreakerState;
  nextRuns: NextRun[];
  jobs: SchedulerSnapshot['jobs'];
}
