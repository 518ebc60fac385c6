/**
 * Notification provider base
 *
 * A provider owns one channel. It filters messages by level, spaces its
 * requests, retries transient failures and always settles to a
 * ProviderResult.
 */

import {
  DEFAULT_MIN_REQUEST_INTERVAL_MS,
  DEFAULT_NOTIFICATION_RETRY,
} from '../constants.js';
import {
  NotificationDeliveryError,
  NotificationRejectedError,
  errorMessage,
} from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { RetryPolicy, sleep as defaultSleep } from '../resilience/retry-policy.js';
import type {
  NotificationLevel,
  NotificationMessage,
  NotificationToggles,
  ProviderResult,
  RetryConfig,
} from '../types/index.js';

export interface ProviderOptions {
  toggles?: Partial<NotificationToggles>;
  retry?: Partial<RetryConfig>;
  /** Minimum spacing between two requests on this channel */
  minIntervalMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface DeliveryReceipt {
  statusCode?: number;
}

const DEFAULT_TOGGLES: NotificationToggles = {
  enabled: true,
  notifySuccess: true,
  notifyFailure: true,
  notifyWarnings: true,
  notifyScheduler: true,
};

const LEVEL_TOGGLE: Record<NotificationLevel, keyof NotificationToggles> = {
  success: 'notifySuccess',
  error: 'notifyFailure',
  warning: 'notifyWarnings',
  info: 'notifyScheduler',
};

/**
 * Map a non-2xx HTTP response to a delivery error.
 * 429 and 5xx are retryable; any other status is not.
 */
export async function responseError(
  providerName: string,
  response: Response
): Promise<NotificationDeliveryError | NotificationRejectedError> {
  const text = await response.text().catch(() => '');
  const message = `${providerName} responded ${response.status}${text ? `: ${text}` : ''}`;

  if (response.status === 429) {
    const retryAfter = Number.parseFloat(response.headers.get('Retry-After') ?? '');
    return new NotificationDeliveryError(message, response.status, {
      retryAfterMs: Number.isFinite(retryAfter) ? retryAfter * 1000 : undefined,
    });
  }
  if (response.status >= 500) {
    return new NotificationDeliveryError(message, response.status);
  }
  return new NotificationRejectedError(message, response.status);
}

export abstract class NotificationProvider {
  abstract readonly name: string;

  protected readonly toggles: NotificationToggles;
  protected readonly logger: Logger;

  private readonly retryPolicy: RetryPolicy;
  private readonly minIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private lastRequestAt: number | null = null;

  constructor(options?: ProviderOptions) {
    this.toggles = { ...DEFAULT_TOGGLES, ...options?.toggles };
    this.logger = (options?.logger ?? rootLogger).child('notifications');
    this.sleep = options?.sleep ?? defaultSleep;
    this.now = options?.now ?? (() => Date.now());
    this.minIntervalMs = options?.minIntervalMs ?? DEFAULT_MIN_REQUEST_INTERVAL_MS;
    this.retryPolicy = new RetryPolicy(
      { ...DEFAULT_NOTIFICATION_RETRY, ...options?.retry },
      { logger: this.logger, sleep: this.sleep }
    );
  }

  /** Perform one request; throw a typed error on failure */
  protected abstract deliver(message: NotificationMessage): Promise<DeliveryReceipt>;

  shouldNotify(message: NotificationMessage): boolean {
    return this.toggles.enabled && this.toggles[LEVEL_TOGGLE[message.level]];
  }

  /**
   * Deliver under this provider's retry policy and rate limit
   *
   * @returns The result; never rejects
   */
  async send(message: NotificationMessage): Promise<ProviderResult> {
    try {
      const receipt = await this.retryPolicy.execute(async () => {
        await this.waitForSlot();
        return this.deliver(message);
      }, `notify:${this.name}`);

      this.logger.info('Notification delivered', { provider: this.name, title: message.title });
      return {
        providerName: this.name,
        success: true,
        ...(receipt.statusCode !== undefined && { statusCode: receipt.statusCode }),
      };
    } catch (error) {
      const statusCode =
        error instanceof NotificationDeliveryError || error instanceof NotificationRejectedError
          ? error.statusCode
          : undefined;
      this.logger.warn('Notification failed', {
        provider: this.name,
        statusCode,
        error: errorMessage(error),
      });
      return {
        providerName: this.name,
        success: false,
        ...(statusCode !== undefined && { statusCode }),
        errorMessage: errorMessage(error),
      };
    }
  }

  /** Reserve the next request slot, then wait for it */
  private async waitForSlot(): Promise<void> {
    const now = this.now();
    const slot =
      this.lastRequestAt === null ? now : Math.max(now, this.lastRequestAt + this.minIntervalMs);
    this.lastRequestAt = slot;

    const waitMs = slot - now;
    if (waitMs > 0) {
      this.logger.debug('Rate limit wait', { provider: this.name, waitMs });
      await this.sleep(waitMs);
    }
  }
}
