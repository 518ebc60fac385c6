/**
 * Notification Dispatcher Tests
 */

import { describe, it, expect, vi } from 'vitest';

import { NotificationRejectedError } from '../../errors.js';
import { createSilentLogger } from '../../logging/logger.js';
import { createOutcome } from '../../orchestration/orchestrator.js';
import type { NotificationMessage, ProviderResult } from '../../types/index.js';
import { NotificationDispatcher } from '../dispatcher.js';
import {
  NotificationProvider,
  type DeliveryReceipt,
  type ProviderOptions,
} from '../provider.js';

class StubProvider extends NotificationProvider {
  readonly received: NotificationMessage[] = [];

  constructor(
    readonly name: string,
    private readonly failure?: Error,
    options?: ProviderOptions
  ) {
    super({ logger: createSilentLogger(), minIntervalMs: 0, ...options });
  }

  protected async deliver(message: NotificationMessage): Promise<DeliveryReceipt> {
    this.received.push(message);
    if (this.failure) {
      throw this.failure;
    }
    return { statusCode: 200 };
  }
}

class BrokenProvider extends StubProvider {
  override send(): Promise<ProviderResult> {
    return Promise.reject(new Error('provider crashed'));
  }
}

const failedOutcome = createOutcome({
  success: false,
  action: 'enter',
  timestamp: '2026-03-02T08:30:00.000Z',
  message: 'authenticate failed: credentials rejected',
  isSimulation: false,
  failure: { step: 'authenticate', kind: 'terminal' },
  attachments: [],
});

describe('NotificationDispatcher', () => {
  it('sends a failed outcome at error level to every eligible provider', async () => {
    const discord = new StubProvider('discord');
    const webhook = new StubProvider('webhook');
    const quiet = new StubProvider('email', undefined, { toggles: { notifyFailure: false } });
    const dispatcher = new NotificationDispatcher([discord, webhook, quiet], {
      logger: createSilentLogger(),
    });

    const results = await dispatcher.dispatch(failedOutcome);

    expect(results).toEqual([
      { providerName: 'discord', success: true, statusCode: 200 },
      { providerName: 'webhook', success: true, statusCode: 200 },
    ]);
    expect(discord.received[0]?.level).toBe('error');
    expect(discord.received[0]?.title).toBe('Clock-in failed');
    expect(webhook.received[0]).toBe(discord.received[0]);
    expect(quiet.received).toEqual([]);
  });

  it('keeps one provider failure from affecting the others', async () => {
    const rejected = new NotificationRejectedError('discord responded 401: invalid token', 401);
    const dispatcher = new NotificationDispatcher(
      [new StubProvider('discord', rejected), new StubProvider('webhook')],
      { logger: createSilentLogger() }
    );

    const results = await dispatcher.dispatch(failedOutcome);

    expect(results).toEqual([
      {
        providerName: 'discord',
        success: false,
        statusCode: 401,
        errorMessage: 'discord responded 401: invalid token',
      },
      { providerName: 'webhook', success: true, statusCode: 200 },
    ]);
  });

  it('turns a rejected send into a failed result', async () => {
    const dispatcher = new NotificationDispatcher([new BrokenProvider('broken')], {
      logger: createSilentLogger(),
    });

    const results = await dispatcher.dispatch(failedOutcome);

    expect(results).toEqual([
      { providerName: 'broken', success: false, errorMessage: 'provider crashed' },
    ]);
  });

  it('builds scheduler messages with the injected clock', async () => {
    const provider = new StubProvider('webhook');
    const dispatcher = new NotificationDispatcher([provider], {
      logger: createSilentLogger(),
      now: () => new Date('2026-03-02T07:00:00.000Z'),
    });

    await dispatcher.dispatch({ type: 'stopped', text: 'Scheduler shut down' });

    expect(provider.received[0]).toMatchObject({
      title: 'Scheduler stopped',
      level: 'info',
      timestamp: '2026-03-02T07:00:00.000Z',
    });
  });

  it('returns no results when nobody wants the message', async () => {
    const provider = new StubProvider('webhook', undefined, { toggles: { enabled: false } });
    const send = vi.spyOn(provider, 'send');
    const dispatcher = new NotificationDispatcher([provider], { logger: createSilentLogger() });

    expect(await dispatcher.dispatch(failedOutcome)).toEqual([]);
    expect(send).not.toHaveBeenCalled();
  });

  it('lists provider names', () => {
    const dispatcher = new NotificationDispatcher(
      [new StubProvider('discord'), new StubProvider('email')],
      { logger: createSilentLogger() }
    );
    expect(dispatcher.providerNames).toEqual(['discord', 'email']);
  });
});
