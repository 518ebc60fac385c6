/**
 * Secrets cache tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { ConfigurationError, createSilentLogger } from '@shiftclock/core';

import { SecretsCache } from '../secrets-cache.js';

describe('SecretsCache', () => {
  const send = vi.fn();
  let clock: number;
  let cache: SecretsCache;

  beforeEach(() => {
    send.mockReset();
    clock = 0;
    cache = new SecretsCache({
      client: { send },
      ttlMs: 1_000,
      now: () => clock,
      logger: createSilentLogger(),
    });
  });

  it('fetches a secret by id', async () => {
    send.mockResolvedValueOnce({ SecretString: '{"username":"jdoe"}' });

    await expect(cache.getSecret('portal/credentials')).resolves.toBe('{"username":"jdoe"}');

    const command = send.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(GetSecretValueCommand);
    expect(command.input).toEqual({ SecretId: 'portal/credentials' });
  });

  it('serves the cached value until the ttl expires', async () => {
    send
      .mockResolvedValueOnce({ SecretString: 'first' })
      .mockResolvedValueOnce({ SecretString: 'rotated' });

    await cache.getSecret('portal/credentials');
    clock = 999;
    await expect(cache.getSecret('portal/credentials')).resolves.toBe('first');
    clock = 1_000;
    await expect(cache.getSecret('portal/credentials')).resolves.toBe('rotated');
    expect(send).toHaveBeenCalledTimes(2);
  });

  it('refetches after invalidate and clear', async () => {
    send.mockResolvedValue({ SecretString: 'value' });

    await cache.getSecret('a');
    cache.invalidate('a');
    await cache.getSecret('a');
    cache.clear();
    await cache.getSecret('a');

    expect(send).toHaveBeenCalledTimes(3);
  });

  it('rejects a secret without a string value', async () => {
    send.mockResolvedValueOnce({ SecretBinary: new Uint8Array([1]) });

    const error = await cache.getSecret('portal/credentials').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toHaveProperty('message', 'Secret portal/credentials has no string value');
  });

  it('shares one request between concurrent lookups', async () => {
    send.mockResolvedValueOnce({ SecretString: 'value' });

    const [first, second] = await Promise.all([cache.getSecret('a'), cache.getSecret('a')]);

    expect(first).toBe('value');
    expect(second).toBe('value');
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('does not cache failures', async () => {
    send.mockRejectedValueOnce(new Error('AccessDenied')).mockResolvedValueOnce({ SecretString: 'ok' });

    await expect(cache.getSecret('a')).rejects.toThrow('AccessDenied');
    await expect(cache.getSecret('a')).resolves.toBe('ok');
  });
});
