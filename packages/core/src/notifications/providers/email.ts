/**
 * E-mail provider over Amazon SES
 *
 * Screenshots are listed by path; SES SendEmail carries no attachments.
 */

import { SESClient } from '../../integrations/ses.js';
import type { NotificationMessage } from '../../types/index.js';
import { NotificationProvider, type DeliveryReceipt, type ProviderOptions } from '../provider.js';

export interface EmailProviderOptions extends ProviderOptions {
  to: string[];
  fromAddress: string;
  region?: string;
  /** Pre-built client, mostly for tests */
  client?: Pick<SESClient, 'sendEmail'>;
}

export function renderEmailText(message: NotificationMessage): string {
  const lines = [message.title, '', message.body, ''];
  for (const [name, value] of message.details) {
    lines.push(`${name}: ${value}`);
  }
  if (message.attachments.length > 0) {
    lines.push('', 'Attachments:', ...message.attachments.map((path) => `- ${path}`));
  }
  return lines.join('\n');
}

export class EmailProvider extends NotificationProvider {
  readonly name = 'email';

  private readonly to: string[];
  private readonly client: Pick<SESClient, 'sendEmail'>;

  constructor(options: EmailProviderOptions) {
    super(options);
    this.to = options.to;
    this.client =
      options.client ?? new SESClient({ region: options.region, fromAddress: options.fromAddress });
  }

  protected async deliver(message: NotificationMessage): Promise<DeliveryReceipt> {
    await this.client.sendEmail({
      to: this.to,
      subject: `[shiftclock] ${message.title}`,
      bodyText: renderEmailText(message),
    });
    return {};
  }
}
