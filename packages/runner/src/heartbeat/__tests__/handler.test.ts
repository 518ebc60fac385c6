/**
 * Heartbeat handler tests
 */

import { describe, it, expect, vi } from 'vitest';
import { CircuitBreaker, Logger, TransientError, type SchedulerSnapshot } from '@shiftclock/core';

import { createHeartbeatHandler } from '../handler.js';

const snapshot: SchedulerSnapshot = {
  running: true,
  enabled: true,
  jobs: [
    {
      id: 'enter-daily',
      action: 'enter',
      timeOfDay: '09:00',
      weekdaysOnly: true,
      nextRunAt: '2026-03-03T09:00:00.000Z',
      running: false,
      runCount: 4,
      successCount: 3,
      failureCount: 1,
      coalescedCount: 0,
      misfireCount: 0,
      lastRunAt: '2026-03-02T09:00:00.000Z',
      lastMessage: 'Clock-in succeeded',
    },
  ],
};

const nextRuns = [{ action: 'enter' as const, at: new Date('2026-03-03T09:00:00.000Z') }];

function createLogger() {
  const logger = new Logger({ level: 'silent' });
  const child = new Logger({ level: 'silent' });
  vi.spyOn(logger, 'child').mockReturnValue(child);
  const info = vi.spyOn(child, 'info');
  const warn = vi.spyOn(child, 'warn');
  return { logger, info, warn };
}

describe('createHeartbeatHandler', () => {
  it('reports the scheduler and breaker state', () => {
    const { logger, info } = createLogger();
    const heartbeat = createHeartbeatHandler({
      scheduler: { getNextRuns: () => nextRuns },
      breaker: new CircuitBreaker({ serviceName: 'portal' }),
      logger,
      now: () => new Date('2026-03-02T12:00:00.000Z'),
      newId: () => 'hb-1',
    });

    const output = heartbeat(snapshot);

    expect(output).toEqual({
      heartbeatId: 'hb-1',
      timestamp: '2026-03-02T12:00:00.000Z',
      running: true,
      circuitState: 'closed',
      nextRuns,
      jobs: snapshot.jobs,
    });
    expect(info).toHaveBeenCalledWith('Runner alive', {
      heartbeatId: 'hb-1',
      circuitState: 'closed',
      nextRuns: [{ action: 'enter', at: '2026-03-03T09:00:00.000Z' }],
      jobs: [
        {
          id: 'enter-daily',
          runs: 4,
          successes: 3,
          failures: 1,
          lastMessage: 'Clock-in succeeded',
        },
      ],
    });
  });

  it('warns while the portal circuit is open', () => {
    const { logger, warn } = createLogger();
    const breaker = new CircuitBreaker({
      serviceName: 'portal',
      failureThreshold: 1,
      recoveryTimeoutMs: 60_000,
      now: () => 1_000,
    });
    breaker.recordFailure(new TransientError('timeout'));

    const heartbeat = createHeartbeatHandler({
      scheduler: { getNextRuns: () => [] },
      breaker,
      logger,
      newId: () => 'hb-2',
    });

    expect(heartbeat(snapshot).circuitState).toBe('open');
    expect(warn).toHaveBeenCalledWith(
      'Runner alive, portal circuit not closed',
      expect.objectContaining({ circuitState: 'open', consecutiveFailures: 1 })
    );
  });

  it('issues a fresh id for every beat', () => {
    const { logger } = createLogger();
    const heartbeat = createHeartbeatHandler({
      scheduler: { getNextRuns: () => [] },
      breaker: new CircuitBreaker(),
      logger,
    });

    expect(heartbeat(snapshot).heartbeatId).not.toBe(heartbeat(snapshot).heartbeatId);
  });
});
