/**
 * Metrics emitter tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PutMetricDataCommand } from '@aws-sdk/client-cloudwatch';
import { createSilentLogger } from '@shiftclock/core';

import { MetricsEmitter } from '../metrics.js';

const timestamp = new Date('2026-03-02T09:00:00.000Z');

describe('MetricsEmitter', () => {
  const send = vi.fn();

  function createEmitter(enabled = true): MetricsEmitter {
    return new MetricsEmitter({
      client: { send },
      environment: 'test',
      enabled,
      logger: createSilentLogger(),
      now: () => timestamp,
    });
  }

  beforeEach(() => {
    send.mockReset();
    send.mockResolvedValue({});
  });

  it('sends buffered counts with the environment dimension', async () => {
    const metrics = createEmitter();
    metrics.increment('ActionRunCount', { Action: 'enter' });
    metrics.record('RetryAttemptCount', 2);

    await metrics.flush();

    const command = send.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(PutMetricDataCommand);
    expect(command.input).toEqual({
      Namespace: 'Shiftclock',
      MetricData: [
        {
          MetricName: 'ActionRunCount',
          Value: 1,
          Unit: 'Count',
          Timestamp: timestamp,
          Dimensions: [
            { Name: 'Environment', Value: 'test' },
            { Name: 'Action', Value: 'enter' },
          ],
        },
        {
          MetricName: 'RetryAttemptCount',
          Value: 2,
          Unit: 'Count',
          Timestamp: timestamp,
          Dimensions: [{ Name: 'Environment', Value: 'test' }],
        },
      ],
    });
    expect(metrics.getBufferSize()).toBe(0);
  });

  it('splits large buffers into batches of 1000', async () => {
    const metrics = createEmitter();
    for (let i = 0; i < 1001; i++) {
      metrics.increment('ActionRunCount');
    }

    await metrics.flush();

    expect(send).toHaveBeenCalledTimes(2);
    expect(send.mock.calls[0]?.[0].input.MetricData).toHaveLength(1000);
    expect(send.mock.calls[1]?.[0].input.MetricData).toHaveLength(1);
  });

  it('does nothing with an empty buffer', async () => {
    await createEmitter().flush();
    expect(send).not.toHaveBeenCalled();
  });

  it('drops data points when disabled', async () => {
    const metrics = createEmitter(false);
    metrics.increment('CircuitOpenCount');

    expect(metrics.getBufferSize()).toBe(0);
    await metrics.flush();
    expect(send).not.toHaveBeenCalled();
  });

  it('never throws when CloudWatch fails', async () => {
    send.mockRejectedValueOnce(new Error('Throttling'));
    const metrics = createEmitter();
    metrics.increment('ActionFailureCount');

    await expect(metrics.flush()).resolves.toBeUndefined();
    expect(metrics.getBufferSize()).toBe(0);
  });
});
