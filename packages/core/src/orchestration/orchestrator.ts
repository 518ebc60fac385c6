/**
 * Action orchestrator
 *
 * Runs one action as a linear state machine:
 *
 *   start → authenticated → navigated → state-checked
 *         → action-attempted → verified → done
 *
 * Any step failure moves straight to `failed`. Every run resolves with
 * exactly one frozen ActionOutcome; nothing thrown by a step escapes `run`.
 */

import { ConfirmationGate } from '../confirmation/gate.js';
import {
  DEFAULT_ACTION_RETRY,
  DEFAULT_STATUS_RETRY,
  DEFAULT_STEP_RETRY,
  VERIFICATION,
} from '../constants.js';
import {
  UserCancelledError,
  VerificationAmbiguousError,
  errorMessage,
} from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { RetryPolicy, classifyError } from '../resilience/retry-policy.js';
import { parseStatusSnapshot } from '../schemas/index.js';
import {
  ACTION_LABELS,
  REAL_ACTIONS,
  isRealAction,
  type Action,
  type ActionOutcome,
  type FailureKind,
  type OrchestratorState,
  type OrchestratorStep,
  type RealAction,
  type StatusSnapshot,
} from '../types/index.js';
import { ResultVerifier } from '../verification/verifier.js';
import type { ActionSurface, OrchestratorOptions, RunRequest } from './types.js';

export const ACTION_UNAVAILABLE_MESSAGE = 'action unavailable';
export const NO_ACTION_AVAILABLE_MESSAGE = 'no action available';

/** A step failure already shaped for the outcome */
class StepFailure extends Error {
  constructor(
    readonly step: OrchestratorStep,
    readonly kind: FailureKind,
    message: string,
    readonly externalSignal?: string
  ) {
    super(message);
    this.name = 'StepFailure';
  }
}

interface OutcomeFields {
  success: boolean;
  action: Action;
  timestamp: string;
  message: string;
  isSimulation: boolean;
  externalSignal?: string;
  failure?: ActionOutcome['failure'];
  attachments: string[];
}

/**
 * Build the immutable outcome of a run
 */
export function createOutcome(fields: OutcomeFields): ActionOutcome {
  const outcome: ActionOutcome = {
    success: fields.success,
    action: fields.action,
    timestamp: fields.timestamp,
    message: fields.message,
    isSimulation: fields.isSimulation,
    attachments: Object.freeze([...fields.attachments]),
    ...(fields.externalSignal !== undefined && { externalSignal: fields.externalSignal }),
    ...(fields.failure && { failure: Object.freeze({ ...fields.failure }) }),
  };
  return Object.freeze(outcome);
}

export class ActionOrchestrator {
  private state: OrchestratorState = 'start';

  private readonly surface: ActionSurface;
  private readonly gate: ConfirmationGate;
  private readonly verifier: ResultVerifier;
  private readonly authenticatePolicy: RetryPolicy;
  private readonly navigatePolicy: RetryPolicy;
  private readonly statusPolicy: RetryPolicy;
  private readonly actionPolicy: RetryPolicy;
  private readonly verificationTimeoutMs: number;
  private readonly captureEvidence: boolean;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(surface: ActionSurface, options?: OrchestratorOptions) {
    this.surface = surface;
    this.logger = (options?.logger ?? rootLogger).child('orchestrator');

    const policyOptions = {
      logger: this.logger,
      sleep: options?.sleep,
      onAttempt: options?.onRetryAttempt,
    };
    const retry = options?.retry;
    this.authenticatePolicy = new RetryPolicy(
      { ...DEFAULT_STEP_RETRY, ...retry?.authenticate },
      policyOptions
    );
    this.navigatePolicy = new RetryPolicy({ ...DEFAULT_STEP_RETRY, ...retry?.navigate }, policyOptions);
    this.statusPolicy = new RetryPolicy({ ...DEFAULT_STATUS_RETRY, ...retry?.status }, policyOptions);
    this.actionPolicy = new RetryPolicy({ ...DEFAULT_ACTION_RETRY, ...retry?.action }, policyOptions);

    this.gate = options?.gate ?? new ConfirmationGate({ logger: this.logger });
    this.verifier = new ResultVerifier(surface, {
      rules: options?.rules,
      vocabulary: options?.vocabulary,
      pollIntervalMs: options?.pollIntervalMs,
      sleep: options?.sleep,
      logger: this.logger,
    });
    this.verificationTimeoutMs = options?.verificationTimeoutMs ?? VERIFICATION.TIMEOUT_MS;
    this.captureEvidence = options?.captureEvidence ?? false;
    this.now = options?.now ?? (() => new Date());
  }

  /** State reached by the most recent run */
  getState(): OrchestratorState {
    return this.state;
  }

  /**
   * Run one action end to end.
   *
   * @returns The outcome; never rejects
   */
  async run(request: RunRequest): Promise<ActionOutcome> {
    const { action } = request;
    const timestamp = this.now().toISOString();
    const log = request.runId ? this.logger.with({ runId: request.runId }) : this.logger;
    const attachments: string[] = [];
    let step: OrchestratorStep = 'authenticate';

    this.state = 'start';
    log.info('Run started', { action });

    try {
      await this.authenticatePolicy.execute(
        () => this.surface.authenticate(request.credentials),
        'authenticate'
      );
      this.transition('authenticated', log);

      step = 'navigate';
      await this.navigatePolicy.execute(() => this.surface.navigate(), 'navigate');
      await this.acquirePosition(log);
      this.transition('navigated', log);

      step = 'check-state';
      const snapshot = await this.checkState();
      this.transition('state-checked', log);
      log.info('Status read', {
        enterAvailable: snapshot.enterAvailable,
        exitAvailable: snapshot.exitAvailable,
        remoteTime: snapshot.remoteTime,
        locationText: snapshot.locationText,
      });

      step = 'attempt-action';
      if (!isRealAction(action)) {
        return this.finishSimulation(snapshot, timestamp, attachments, log);
      }

      if (!isAvailable(action, snapshot)) {
        throw new StepFailure('attempt-action', 'unavailable', ACTION_UNAVAILABLE_MESSAGE);
      }

      let authorized: boolean;
      try {
        authorized = await this.gate.authorize(
          action,
          request.interactive ?? false,
          request.explicitConfirm ?? false,
          request.signal
        );
      } catch (error) {
        if (error instanceof UserCancelledError) {
          this.transition('done', log);
          log.info('Run cancelled by operator', { action });
          return createOutcome({
            success: true,
            action,
            timestamp,
            message: error.message,
            isSimulation: true,
            attachments,
          });
        }
        throw error;
      }

      if (!authorized) {
        this.transition('action-attempted', log);
        this.transition('done', log);
        log.info('Action simulated', { action });
        return createOutcome({
          success: true,
          action,
          timestamp,
          message: `${ACTION_LABELS[action]} simulated, not confirmed`,
          isSimulation: true,
          attachments,
        });
      }

      await this.actionPolicy.execute(() => this.surface.performAction(action), 'attempt-action');
      this.transition('action-attempted', log);

      step = 'verify';
      const verification = await this.verifier.verify(action, this.verificationTimeoutMs, snapshot);
      await this.capture(`${action}-result`, attachments, log);

      if (verification.method === 'timeout') {
        throw new VerificationAmbiguousError(verification.message);
      }
      if (!verification.success) {
        throw new StepFailure(
          'verify',
          'terminal',
          verification.message,
          verification.externalSignal ?? undefined
        );
      }

      this.transition('verified', log);
      this.transition('done', log);
      log.info('Run succeeded', { action, method: verification.method });
      return createOutcome({
        success: true,
        action,
        timestamp,
        message: verification.message,
        isSimulation: false,
        externalSignal: verification.externalSignal ?? undefined,
        attachments,
      });
    } catch (error) {
      this.transition('failed', log);
      const failure = toStepFailure(error, step);

      log.warn('Run failed', { action, step: failure.step, kind: failure.kind, message: failure.message });
      if (failure.step !== 'verify') {
        await this.capture(`${failure.step}-failure`, attachments, log);
      }

      return createOutcome({
        success: false,
        action,
        timestamp,
        message: failure.message,
        isSimulation: false,
        externalSignal: failure.externalSignal,
        failure: { step: failure.step, kind: failure.kind },
        attachments,
      });
    }
  }

  /** Read and validate the status snapshot */
  private async checkState(): Promise<StatusSnapshot> {
    const raw = await this.statusPolicy.execute(() => this.surface.readStatus(), 'check-state');
    return parseStatusSnapshot(raw);
  }

  private async acquirePosition(log: Logger): Promise<void> {
    try {
      await this.surface.acquirePosition();
    } catch (error) {
      log.warn('Positioning failed, continuing', { error: errorMessage(error) });
    }
  }

  /** Rehearse every available action without touching the surface */
  private finishSimulation(
    snapshot: StatusSnapshot,
    timestamp: string,
    attachments: string[],
    log: Logger
  ): ActionOutcome {
    const available = REAL_ACTIONS.filter((candidate) => isAvailable(candidate, snapshot));
    if (available.length === 0) {
      throw new StepFailure('attempt-action', 'unavailable', NO_ACTION_AVAILABLE_MESSAGE);
    }

    this.transition('done', log);
    const labels = available.map((candidate) => ACTION_LABELS[candidate]).join(' and ');
    log.info('Simulation finished', { available });
    return createOutcome({
      success: true,
      action: 'simulate',
      timestamp,
      message: `Simulated ${labels}`,
      isSimulation: true,
      attachments,
    });
  }

  private transition(to: OrchestratorState, log: Logger): void {
    log.debug('State transition', { from: this.state, to });
    this.state = to;
  }

  private async capture(label: string, attachments: string[], log: Logger): Promise<void> {
    if (!this.captureEvidence || !this.surface.captureScreenshot) {
      return;
    }
    try {
      attachments.push(await this.surface.captureScreenshot(label));
    } catch (error) {
      log.warn('Screenshot failed', { label, error: errorMessage(error) });
    }
  }
}

function toStepFailure(error: unknown, step: OrchestratorStep): StepFailure {
  if (error instanceof StepFailure) {
    return error;
  }
  if (error instanceof VerificationAmbiguousError) {
    return new StepFailure(step, 'ambiguous', error.message);
  }
  const kind: FailureKind = classifyError(error) === 'terminal' ? 'terminal' : 'transient';
  return new StepFailure(step, kind, `${step} failed: ${errorMessage(error)}`);
}

function isAvailable(action: RealAction, snapshot: StatusSnapshot): boolean {
  return action === 'enter' ? snapshot.enterAvailable : snapshot.exitAvailable;
}
