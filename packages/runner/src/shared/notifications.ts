/**
 * Build notification providers from validated settings
 */

import {
  DiscordProvider,
  EmailProvider,
  NotificationDispatcher,
  WebhookProvider,
  type Logger,
  type NotificationProvider,
  type NotificationSettings,
  type ProviderConfig,
} from '@shiftclock/core';

export function createProvider(config: ProviderConfig, logger: Logger): NotificationProvider {
  const common = {
    toggles: {
      enabled: config.enabled,
      notifySuccess: config.notifySuccess,
      notifyFailure: config.notifyFailure,
      notifyWarnings: config.notifyWarnings,
      notifyScheduler: config.notifyScheduler,
    },
    ...(config.retry ? { retry: config.retry } : {}),
    ...(config.minIntervalMs !== undefined ? { minIntervalMs: config.minIntervalMs } : {}),
    logger,
  };

  switch (config.type) {
    case 'discord':
      return new DiscordProvider({
        ...common,
        url: config.url,
        ...(config.username ? { username: config.username } : {}),
        ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
      });
    case 'webhook':
      return new WebhookProvider({
        ...common,
        url: config.url,
        name: config.name,
        ...(config.headers ? { headers: config.headers } : {}),
        ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
      });
    case 'email':
      return new EmailProvider({
        ...common,
        to: config.to,
        fromAddress: config.fromAddress,
        ...(config.region ? { region: config.region } : {}),
      });
  }
}

export function createDispatcher(
  settings: NotificationSettings,
  logger: Logger
): NotificationDispatcher {
  const providers = settings.providers.map((config) => createProvider(config, logger));
  if (providers.length === 0) {
    logger.warn('No notification providers configured');
  }
  return new NotificationDispatcher(providers, { logger });
}
