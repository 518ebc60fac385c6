/**
 * Core TypeScript types for shiftclock
 *
 * Runtime validation for the configuration-shaped records lives in
 * ../schemas/index.ts; the types here are the ones passed between
 * components at run time.
 */

// ============================================================================
// Actions
// ============================================================================

/**
 * The two mutually exclusive operations, plus the marker used when a run only
 * rehearses whatever is available.
 */
export type Action = 'enter' | 'exit' | 'simulate';

/** An action that mutates state on the remote surface */
export type RealAction = Exclude<Action, 'simulate'>;

export const REAL_ACTIONS: readonly RealAction[] = ['enter', 'exit'];

/** Human-readable label used in log lines and notifications */
export const ACTION_LABELS: Record<Action, string> = {
  enter: 'Clock-in',
  exit: 'Clock-out',
  simulate: 'Simulation',
};

export function isRealAction(action: Action): action is RealAction {
  return action !== 'simulate';
}

// ============================================================================
// Orchestration
// ============================================================================

export type OrchestratorStep =
  | 'authenticate'
  | 'navigate'
  | 'check-state'
  | 'attempt-action'
  | 'verify';

export type OrchestratorState =
  | 'start'
  | 'authenticated'
  | 'navigated'
  | 'state-checked'
  | 'action-attempted'
  | 'verified'
  | 'done'
  | 'failed';

/**
 * Why a run failed.
 *
 * - terminal: never retried (rejected credentials, malformed data)
 * - transient: retried and still failing (network, driver, timeouts)
 * - ambiguous: verification found no conclusive signal
 * - unavailable: the requested action was not offered by the surface
 * - circuit-open: the run was not attempted because the breaker is open
 */
export type FailureKind =
  | 'terminal'
  | 'transient'
  | 'ambiguous'
  | 'unavailable'
  | 'circuit-open';

export interface OutcomeFailure {
  step: OrchestratorStep | 'circuit';
  kind: FailureKind;
}

/**
 * Final record of one orchestrator run. Frozen on creation.
 */
export interface ActionOutcome {
  readonly success: boolean;
  readonly action: Action;
  /** ISO 8601 timestamp of when the run started */
  readonly timestamp: string;
  readonly message: string;
  /** Text of the remote notice that decided the result, if any */
  readonly externalSignal?: string;
  readonly isSimulation: boolean;
  readonly failure?: OutcomeFailure;
  /** Screenshot paths captured during the run */
  readonly attachments: readonly string[];
}

/**
 * Fixed-shape view of the remote surface at one instant.
 * Display-only fields are null when the surface did not show them.
 */
export interface StatusSnapshot {
  enterAvailable: boolean;
  exitAvailable: boolean;
  pageLoaded: boolean;
  positionReady: boolean;
  remoteTime: string | null;
  remoteDate: string | null;
  locationText: string | null;
  capturedAt: string;
}

export interface Credentials {
  username: string;
  password: string;
  organization?: string;
}

// ============================================================================
// Verification
// ============================================================================

/** Which configured signal group a visible notice was read from */
export type SignalKind = 'success' | 'failure' | 'notice';

export interface SurfaceSignal {
  kind: SignalKind;
  text: string;
}

export type SignalClassification = 'success' | 'failure';

/**
 * One ordered matcher rule. A signal matches when its kind equals the rule's
 * kind, the rule applies to the action, the pattern matches its text and,
 * with requireActionTerm, the text mentions the action.
 */
export interface SignalRule {
  id: string;
  kind: SignalKind;
  classification: SignalClassification;
  pattern: RegExp;
  actions?: readonly RealAction[];
  requireActionTerm?: boolean;
}

/** Words that lexically associate a notice with an action */
export interface ActionVocabulary {
  enter: readonly string[];
  exit: readonly string[];
  /** Terms that associate a notice with either action */
  shared: readonly string[];
}

export type VerificationMethod = 'signal' | 'state-diff' | 'timeout';

export interface VerificationResult {
  success: boolean;
  message: string;
  externalSignal: string | null;
  method: VerificationMethod;
}

// ============================================================================
// Resilience
// ============================================================================

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffBase: number;
  jitter: boolean;
}

export type ErrorClassification = 'terminal' | 'transient';

/** Circuit breaker state */
export type CircuitBreakerState = 'closed' | 'open' | 'half-open';

// ============================================================================
// Scheduling
// ============================================================================

export interface ScheduleConfig {
  /** Local time of day, HH:MM */
  enterTime: string;
  exitTime: string;
  enabled: boolean;
  weekdaysOnly: boolean;
  heartbeatIntervalMs: number;
  misfireGraceMs: number;
}

export type SchedulerEventType = 'started' | 'stopped' | 'error';

export interface SchedulerEvent {
  type: SchedulerEventType;
  text: string;
  details?: Array<[string, string]>;
}

// ============================================================================
// Notifications
// ============================================================================

export type NotificationLevel = 'success' | 'warning' | 'error' | 'info';

export interface NotificationMessage {
  readonly title: string;
  readonly body: string;
  readonly level: NotificationLevel;
  readonly timestamp: string;
  readonly details: ReadonlyArray<readonly [string, string]>;
  readonly attachments: readonly string[];
}

export interface ProviderResult {
  providerName: string;
  success: boolean;
  statusCode?: number;
  errorMessage?: string;
}

/** Level toggles shared by every provider */
export interface NotificationToggles {
  enabled: boolean;
  notifySuccess: boolean;
  notifyFailure: boolean;
  notifyWarnings: boolean;
  notifyScheduler: boolean;
}
