/**
 * Heartbeat handler
 *
 * Called by the scheduler on every heartbeat tick. Logs what the runner is
 * waiting for and the portal breaker's state; never starts a run.
 */

import type {
  ActionScheduler,
  CircuitBreaker,
  Logger,
  SchedulerSnapshot,
} from '@shiftclock/core';
import { ulid } from 'ulid';

import type { HeartbeatOutput } from '../shared/types.js';

export interface HeartbeatDeps {
  scheduler: Pick<ActionScheduler, 'getNextRuns'>;
  breaker: Pick<CircuitBreaker, 'getState' | 'getFailureCount'>;
  logger: Logger;
  now?: () => Date;
  newId?: () => string;
}

export function createHeartbeatHandler(
  deps: HeartbeatDeps
): (snapshot: SchedulerSnapshot) => HeartbeatOutput {
  const now = deps.now ?? (() => new Date());
  const newId = deps.newId ?? (() => ulid());
  const log = deps.logger.child('heartbeat');

  return (snapshot) => {
    const output: HeartbeatOutput = {
      heartbeatId: newId(),
      timestamp: now().toISOString(),
      running: snapshot.running,
      circuitState: deps.breaker.getState(),
      nextRuns: deps.scheduler.getNextRuns(),
      jobs: snapshot.jobs,
    };

    const summary = {
      heartbeatId: output.heartbeatId,
      circuitState: output.circuitState,
      nextRuns: output.nextRuns.map((run) => ({ action: run.action, at: run.at.toISOString() })),
      jobs: output.jobs.map((job) => ({
        id: job.id,
        runs: job.runCount,
        successes: job.successCount,
        failures: job.failureCount,
        lastMessage: job.lastMessage,
      })),
    };

    if (output.circuitState === 'closed') {
      log.info('Runner alive', summary);
    } else {
      log.warn('Runner alive, portal circuit not closed', {
        ...summary,
        consecutiveFailures: deps.breaker.getFailureCount(),
      });
    }
    return output;
  };
}
