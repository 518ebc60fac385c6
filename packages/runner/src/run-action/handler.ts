/**
 * Run-action handler
 *
 * One run of one action: breaker check, credentials, browser session,
 * orchestrator, breaker accounting, notifications and metrics. This is the
 * ActionRunner the scheduler calls and the body of a manual run.
 */

import {
  ActionOrchestrator,
  CircuitBreaker,
  CircuitBreakerOpenError,
  DriverSurface,
  TerminalError,
  TransientError,
  classifyError,
  createOutcome,
  errorMessage,
  type Action,
  type ActionOutcome,
  type ActionRunner,
  type Logger,
  type NotificationDispatcher,
  type OrchestratorOptions,
  type OrchestratorStep,
  type RetryAttemptRecord,
  type SessionDriver,
  type SurfaceProfile,
} from '@shiftclock/core';
import { ulid } from 'ulid';

import { resolveCredentials } from '../shared/context.js';
import type { MetricsEmitter } from '../shared/metrics.js';
import type { CredentialSource } from '../shared/types.js';

/** Name the breaker and its log lines use for the remote portal */
export const PORTAL_SERVICE = 'portal';

export interface RunOptions {
  interactive?: boolean;
  explicitConfirm?: boolean;
  signal?: AbortSignal;
}

export interface ActionRunHandlerDeps {
  createDriver: () => SessionDriver;
  surface: SurfaceProfile;
  credentials: CredentialSource;
  getSecret: (secretId: string) => Promise<string>;
  dispatcher: NotificationDispatcher;
  breaker: CircuitBreaker;
  metrics: MetricsEmitter;
  /** Settings passed to every orchestrator; logger and retry hook are set per run */
  orchestrator?: Omit<OrchestratorOptions, 'logger' | 'onRetryAttempt'>;
  logger: Logger;
  now?: () => Date;
  newRunId?: () => string;
}

/** Only transient failures say anything about the portal's health */
export function countsTowardBreaker(error: unknown): boolean {
  return classifyError(error) === 'transient';
}

export function createPortalBreaker(
  options: { failureThreshold: number; recoveryTimeoutMs: number },
  logger: Logger
): CircuitBreaker {
  return new CircuitBreaker({
    serviceName: PORTAL_SERVICE,
    failureThreshold: options.failureThreshold,
    recoveryTimeoutMs: options.recoveryTimeoutMs,
    shouldCount: countsTowardBreaker,
    logger,
  });
}

export class ActionRunHandler implements ActionRunner {
  private readonly deps: ActionRunHandlerDeps;
  private readonly now: () => Date;
  private readonly newRunId: () => string;

  constructor(deps: ActionRunHandlerDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.newRunId = deps.newRunId ?? (() => ulid());
  }

  /**
   * Run one action and notify about it.
   * Scheduled runs are pre-authorized; manual runs pass their own options.
   *
   * @returns The outcome; never rejects
   */
  async run(action: Action, options: RunOptions = { explicitConfirm: true }): Promise<ActionOutcome> {
    const { breaker, metrics, dispatcher } = this.deps;
    const runId = this.newRunId();
    const log = this.deps.logger.with({ runId });

    metrics.increment('ActionRunCount', { Action: action });

    let outcome: ActionOutcome;
    if (breaker.canExecute()) {
      outcome = await this.execute(action, options, runId, log);
      if (outcome.success) {
        breaker.recordSuccess();
      } else {
        breaker.recordFailure(failureAsError(outcome));
      }
    } else {
      const refusal = new CircuitBreakerOpenError(PORTAL_SERVICE, breaker.remainingCooldown());
      log.warn('Run skipped, circuit open', { action, retryAfterMs: refusal.retryAfterMs });
      metrics.increment('CircuitOpenCount');
      outcome = createOutcome({
        success: false,
        action,
        timestamp: this.now().toISOString(),
        message: refusal.message,
        isSimulation: false,
        failure: { step: 'circuit', kind: 'circuit-open' },
        attachments: [],
      });
    }

    if (!outcome.success) {
      metrics.increment('ActionFailureCount', { Action: action });
    }

    const results = await dispatcher.dispatch(outcome);
    for (const result of results) {
      if (!result.success) {
        metrics.increment('NotificationFailureCount', { Provider: result.providerName });
      }
    }
    await metrics.flush();

    log.info('Run finished', {
      action,
      success: outcome.success,
      isSimulation: outcome.isSimulation,
      notified: results.filter((result) => result.success).length,
    });
    return outcome;
  }

  private async execute(
    action: Action,
    options: RunOptions,
    runId: string,
    log: Logger
  ): Promise<ActionOutcome> {
    const timestamp = this.now().toISOString();
    const driver = this.deps.createDriver();

    try {
      const credentials = await resolveCredentials(this.deps.credentials, this.deps.getSecret);
      await driver.open();

      const orchestrator = new ActionOrchestrator(
        new DriverSurface(driver, this.deps.surface, { logger: log }),
        {
          ...this.deps.orchestrator,
          logger: log,
          onRetryAttempt: (record) => this.recordRetry(record),
        }
      );
      return await orchestrator.run({ action, credentials, runId, ...options });
    } catch (error) {
      return setupFailure(action, timestamp, 'authenticate', error, log);
    } finally {
      await driver.close().catch((error: unknown) => {
        log.warn('Closing the session failed', { error: errorMessage(error) });
      });
    }
  }

  private recordRetry(record: RetryAttemptRecord): void {
    if (
      record.outcome === 'failure' &&
      record.classification === 'transient' &&
      record.attempt < record.maxAttempts
    ) {
      this.deps.metrics.increment('RetryAttemptCount', { Context: record.context });
    }
  }
}

/** A failure before the orchestrator could start, reported against its first step */
function setupFailure(
  action: Action,
  timestamp: string,
  step: OrchestratorStep,
  error: unknown,
  log: Logger
): ActionOutcome {
  const kind = classifyError(error);
  log.warn('Run could not start', { action, kind, error: errorMessage(error) });
  return createOutcome({
    success: false,
    action,
    timestamp,
    message: `${step} failed: ${errorMessage(error)}`,
    isSimulation: false,
    failure: { step, kind },
    attachments: [],
  });
}

function failureAsError(outcome: ActionOutcome): Error {
  return outcome.failure?.kind === 'transient'
    ? new TransientError(outcome.message)
    : new TerminalError(outcome.message);
}
