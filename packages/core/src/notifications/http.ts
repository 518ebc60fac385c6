/**
 * HTTP transport shared by the webhook-style providers
 */

import { DEFAULT_WEBHOOK_TIMEOUT_MS } from '../constants.js';
import { NotificationDeliveryError, errorMessage } from '../errors.js';
import { responseError, type DeliveryReceipt } from './provider.js';

/**
 * POST a body and map the response.
 *
 * @throws {NotificationDeliveryError} on network failure, timeout, 429 or 5xx
 * @throws {NotificationRejectedError} on any other non-2xx status
 */
export async function postToChannel(
  providerName: string,
  url: string,
  init: { body: string | FormData; headers?: Record<string, string> },
  timeoutMs: number = DEFAULT_WEBHOOK_TIMEOUT_MS
): Promise<DeliveryReceipt> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      body: init.body,
      headers: init.headers,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw new NotificationDeliveryError(
      `${providerName} request failed: ${errorMessage(error)}`,
      undefined,
      { cause: error }
    );
  }

  if (!response.ok) {
    throw await responseError(providerName, response);
  }
  return { statusCode: response.status };
}
