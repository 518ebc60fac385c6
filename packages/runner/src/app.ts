/**
 * Runner wiring
 *
 * Builds the long-lived pieces from a validated configuration: one breaker
 * for the portal, one dispatcher, one run handler and the scheduler that
 * drives it.
 */

import {
  ActionScheduler,
  ConfirmationGate,
  type CircuitBreaker,
  type Logger,
  type NotificationDispatcher,
  type OperatorPrompt,
  type SessionDriver,
} from '@shiftclock/core';
import type { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import type { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';

import { PlaywrightDriver } from './driver/playwright-driver.js';
import { createHeartbeatHandler } from './heartbeat/handler.js';
import { ActionRunHandler, createPortalBreaker } from './run-action/handler.js';
import { MetricsEmitter } from './shared/metrics.js';
import { createDispatcher } from './shared/notifications.js';
import { SecretsCache } from './shared/secrets-cache.js';
import type { HeartbeatOutput, RunnerConfig } from './shared/types.js';

export interface RunnerAppOptions {
  logger: Logger;
  /** Operator prompt for interactive runs */
  prompt?: OperatorPrompt;
  createDriver?: () => SessionDriver;
  secretsClient?: Pick<SecretsManagerClient, 'send'>;
  metricsClient?: Pick<CloudWatchClient, 'send'>;
  onHeartbeat?: (output: HeartbeatOutput) => void;
  now?: () => Date;
}

export interface RunnerApp {
  handler: ActionRunHandler;
  scheduler: ActionScheduler;
  dispatcher: NotificationDispatcher;
  breaker: CircuitBreaker;
  metrics: MetricsEmitter;
}

export function createRunnerApp(config: RunnerConfig, options: RunnerAppOptions): RunnerApp {
  const { logger } = options;
  const now = options.now ?? (() => new Date());

  const secrets = new SecretsCache({
    ...(options.secretsClient ? { client: options.secretsClient } : {}),
    logger,
  });
  const metrics = new MetricsEmitter({
    ...(options.metricsClient ? { client: options.metricsClient } : {}),
    environment: config.environment,
    enabled: config.metricsEnabled,
    logger,
  });
  const dispatcher = createDispatcher(config.notifications, logger);
  const breaker = createPortalBreaker(config.circuit, logger);

  const handler = new ActionRunHandler({
    createDriver:
      options.createDriver ?? (() => new PlaywrightDriver({ ...config.browser, logger })),
    surface: config.surface,
    credentials: config.credentials,
    getSecret: (secretId) => secrets.getSecret(secretId),
    dispatcher,
    breaker,
    metrics,
    orchestrator: {
      gate: new ConfirmationGate({
        ...(options.prompt ? { prompt: options.prompt } : {}),
        logger,
      }),
      // The real click keeps its own single-attempt default
      retry: {
        authenticate: config.retry,
        navigate: config.retry,
        status: config.retry,
      },
      verificationTimeoutMs: config.verificationTimeoutMs,
      captureEvidence: config.notifications.captureEvidence,
      now,
    },
    logger,
    now,
  });

  const heartbeat = createHeartbeatHandler({
    scheduler: { getNextRuns: () => scheduler.getNextRuns() },
    breaker,
    logger,
    now,
  });

  const scheduler = new ActionScheduler(handler, config.schedule, {
    logger,
    now,
    listener: {
      onEvent: async (event) => {
        const results = await dispatcher.dispatch(event);
        for (const result of results) {
          if (!result.success) {
            metrics.increment('NotificationFailureCount', { Provider: result.providerName });
          }
        }
      },
      onHeartbeat: async (snapshot) => {
        const output = heartbeat(snapshot);
        options.onHeartbeat?.(output);
        await metrics.flush();
      },
    },
  });

  return { handler, scheduler, dispatcher, breaker, metrics };
}
