/**
 * Generic JSON webhook provider
 */

import type { NotificationMessage } from '../../types/index.js';
import { postToChannel } from '../http.js';
import { NotificationProvider, type DeliveryReceipt, type ProviderOptions } from '../provider.js';

export interface WebhookProviderOptions extends ProviderOptions {
  url: string;
  name?: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface WebhookPayload {
  title: string;
  body: string;
  level: string;
  timestamp: string;
  details: Record<string, string>;
  attachments: string[];
}

export function buildWebhookPayload(message: NotificationMessage): WebhookPayload {
  return {
    title: message.title,
    body: message.body,
    level: message.level,
    timestamp: message.timestamp,
    details: Object.fromEntries(message.details),
    attachments: [...message.attachments],
  };
}

export class WebhookProvider extends NotificationProvider {
  readonly name: string;

  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number | undefined;

  constructor(options: WebhookProviderOptions) {
    super(options);
    this.name = options.name ?? 'webhook';
    this.url = options.url;
    this.headers = options.headers ?? {};
    this.timeoutMs = options.timeoutMs;
  }

  protected deliver(message: NotificationMessage): Promise<DeliveryReceipt> {
    return postToChannel(
      this.name,
      this.url,
      {
        body: JSON.stringify(buildWebhookPayload(message)),
        headers: { 'Content-Type': 'application/json', ...this.headers },
      },
      this.timeoutMs
    );
  }
}
