/**
 * Amazon SES mailer used by the e-mail notification provider
 */

import {
  SESClient as AWSSESClient,
  SESServiceException,
  SendEmailCommand,
  type Content,
  type SendEmailCommandInput,
} from '@aws-sdk/client-ses';

import {
  NotificationDeliveryError,
  NotificationRejectedError,
  errorMessage,
} from '../errors.js';

const DEFAULT_REGION = 'ap-southeast-2';

/** SES error names that a later attempt can clear */
const RETRYABLE_ERRORS = new Set(['Throttling', 'ThrottlingException', 'ServiceUnavailable']);

export interface SESConfig {
  region?: string;
  fromAddress: string;
}

export interface EmailContent {
  to: string[];
  subject: string;
  bodyText: string;
  bodyHtml?: string;
}

function utf8(data: string): Content {
  return { Data: data, Charset: 'UTF-8' };
}

/**
 * Map an SES failure onto the notification error taxonomy.
 * Server faults and throttling are retryable; every other SES refusal is not.
 */
export function toDeliveryError(
  error: unknown
): NotificationDeliveryError | NotificationRejectedError {
  if (!(error instanceof SESServiceException)) {
    return new NotificationDeliveryError(`ses request failed: ${errorMessage(error)}`, undefined, {
      cause: error,
    });
  }

  const message = `ses ${error.name}: ${error.message}`;
  const statusCode = error.$metadata.httpStatusCode;
  return error.$fault === 'server' || RETRYABLE_ERRORS.has(error.name)
    ? new NotificationDeliveryError(message, statusCode, { cause: error })
    : new NotificationRejectedError(message, statusCode);
}

export class SESClient {
  private readonly client: AWSSESClient;
  private readonly fromAddress: string;

  constructor(config: SESConfig) {
    this.client = new AWSSESClient({ region: config.region ?? DEFAULT_REGION });
    this.fromAddress = config.fromAddress;
  }

  /**
   * @throws {NotificationDeliveryError} for throttling and server faults
   * @throws {NotificationRejectedError} for anything SES refuses outright
   */
  async sendEmail(content: EmailContent): Promise<{ messageId: string }> {
    const input: SendEmailCommandInput = {
      Source: this.fromAddress,
      Destination: { ToAddresses: content.to },
      Message: {
        Subject: utf8(content.subject),
        Body: {
          Text: utf8(content.bodyText),
          ...(content.bodyHtml ? { Html: utf8(content.bodyHtml) } : {}),
        },
      },
    };

    try {
      const result = await this.client.send(new SendEmailCommand(input));
      return { messageId: result.MessageId ?? '' };
    } catch (error) {
      throw toDeliveryError(error);
    }
  }
}
