/**
 * In-memory cache for AWS Secrets Manager values
 *
 * The runner is long-lived, so the portal credentials are fetched once and
 * reused until the TTL expires; a rotated secret is picked up on the first
 * run after expiry. Concurrent lookups of one id share a single request.
 */

import {
  SecretsManagerClient,
  GetSecretValueCommand,
} from '@aws-sdk/client-secrets-manager';
import { ConfigurationError, logger as rootLogger, type Logger } from '@shiftclock/core';

interface CachedSecret {
  value: string;
  expiresAt: number;
}

/** 5 minutes */
const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;

export interface SecretsCacheOptions {
  client?: Pick<SecretsManagerClient, 'send'>;
  ttlMs?: number;
  now?: () => number;
  logger?: Logger;
}

export class SecretsCache {
  private readonly cache = new Map<string, CachedSecret>();
  private readonly pending = new Map<string, Promise<string>>();
  private readonly client: Pick<SecretsManagerClient, 'send'>;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options?: SecretsCacheOptions) {
    this.client = options?.client ?? new SecretsManagerClient({});
    this.ttlMs = options?.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options?.now ?? (() => Date.now());
    this.logger = (options?.logger ?? rootLogger).child('secrets');
  }

  /**
   * @param secretId - ARN or name
   * @throws {ConfigurationError} if the secret holds no string
   */
  getSecret(secretId: string): Promise<string> {
    const cached = this.cache.get(secretId);
    if (cached && this.now() < cached.expiresAt) {
      return Promise.resolve(cached.value);
    }

    const inFlight = this.pending.get(secretId);
    if (inFlight) {
      return inFlight;
    }

    const request = this.fetch(secretId).finally(() => {
      this.pending.delete(secretId);
    });
    this.pending.set(secretId, request);
    return request;
  }

  /** Forget one secret so the next lookup fetches it again */
  invalidate(secretId: string): void {
    this.cache.delete(secretId);
  }

  clear(): void {
    this.cache.clear();
  }

  private async fetch(secretId: string): Promise<string> {
    this.logger.debug('Fetching secret', { secretId });
    const response = await this.client.send(new GetSecretValueCommand({ SecretId: secretId }));

    const value = response.SecretString;
    if (!value) {
      throw new ConfigurationError(`Secret ${secretId} has no string value`);
    }

    this.cache.set(secretId, { value, expiresAt: this.now() + this.ttlMs });
    return value;
  }
}
