/**
 * Orchestration types
 */

import type { ConfirmationGate } from '../confirmation/gate.js';
import type { Logger } from '../logging/logger.js';
import type { RetryAttemptRecord } from '../resilience/retry-policy.js';
import type {
  Action,
  ActionVocabulary,
  Credentials,
  RealAction,
  RetryConfig,
  SignalRule,
} from '../types/index.js';
import type { VerificationSurface } from '../verification/verifier.js';

/**
 * The remote surface as the orchestrator sees it. Each method is one step;
 * any of them may throw a DriverError.
 */
export interface ActionSurface extends VerificationSurface {
  /** @throws {CredentialsRejectedError} when the surface refuses the login */
  authenticate(credentials: Credentials): Promise<void>;
  navigate(): Promise<void>;
  /** Best-effort positioning signal; failures never fail navigation */
  acquirePosition(): Promise<void>;
  performAction(action: RealAction): Promise<void>;
  /** Returns the path of the stored image */
  captureScreenshot?(label: string): Promise<string>;
}

export interface RunRequest {
  action: Action;
  credentials: Credentials;
  /** Ask the operator before a real action */
  interactive?: boolean;
  /** Pre-authorized by an automated caller */
  explicitConfirm?: boolean;
  /** Aborts an in-flight confirmation wait */
  signal?: AbortSignal;
  runId?: string;
}

/** Retry settings per step */
export interface StepRetryConfig {
  authenticate?: Partial<RetryConfig>;
  navigate?: Partial<RetryConfig>;
  status?: Partial<RetryConfig>;
  action?: Partial<RetryConfig>;
}

export interface OrchestratorOptions {
  gate?: ConfirmationGate;
  retry?: StepRetryConfig;
  verificationTimeoutMs?: number;
  pollIntervalMs?: number;
  rules?: readonly SignalRule[];
  vocabulary?: ActionVocabulary;
  /** Capture a screenshot after verification and on failure */
  captureEvidence?: boolean;
  onRetryAttempt?: (record: RetryAttemptRecord) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  logger?: Logger;
}
