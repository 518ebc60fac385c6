/**
 * Notification dispatcher
 *
 * Fans one message out to every eligible provider concurrently. Dispatch
 * never rejects: each provider's failure stays in its own ProviderResult.
 */

import { errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import type {
  ActionOutcome,
  NotificationMessage,
  ProviderResult,
  SchedulerEvent,
} from '../types/index.js';
import { buildOutcomeMessage, buildSchedulerMessage } from './message.js';
import type { NotificationProvider } from './provider.js';

export interface DispatcherOptions {
  logger?: Logger;
  now?: () => Date;
}

function isSchedulerEvent(subject: ActionOutcome | SchedulerEvent): subject is SchedulerEvent {
  return 'type' in subject;
}

export class NotificationDispatcher {
  private readonly providers: readonly NotificationProvider[];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(providers: readonly NotificationProvider[], options?: DispatcherOptions) {
    this.providers = providers;
    this.logger = (options?.logger ?? rootLogger).child('dispatcher');
    this.now = options?.now ?? (() => new Date());
  }

  get providerNames(): string[] {
    return this.providers.map((provider) => provider.name);
  }

  /**
   * Notify every eligible provider about a run outcome or scheduler event
   */
  async dispatch(subject: ActionOutcome | SchedulerEvent): Promise<ProviderResult[]> {
    const message = isSchedulerEvent(subject)
      ? buildSchedulerMessage(subject, this.now())
      : buildOutcomeMessage(subject);
    return this.send(message);
  }

  /** Deliver an already built message */
  async send(message: NotificationMessage): Promise<ProviderResult[]> {
    const eligible = this.providers.filter((provider) => provider.shouldNotify(message));
    if (eligible.length === 0) {
      this.logger.debug('No provider wants this message', { level: message.level });
      return [];
    }

    const settled = await Promise.allSettled(eligible.map((provider) => provider.send(message)));

    const results = settled.map((result, index): ProviderResult => {
      if (result.status === 'fulfilled') {
        return result.value;
      }
      return {
        providerName: eligible[index]?.name ?? 'unknown',
        success: false,
        errorMessage: errorMessage(result.reason),
      };
    });

    const delivered = results.filter((result) => result.success).length;
    const summary = { title: message.title, delivered, total: results.length };
    if (delivered === results.length) {
      this.logger.info('Notifications sent', summary);
    } else if (delivered > 0) {
      this.logger.warn('Some notifications failed', summary);
    } else {
      this.logger.error('All notifications failed', undefined, summary);
    }
    return results;
  }
}
