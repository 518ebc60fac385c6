/**
 * Runner configuration tests
 */

import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '@shiftclock/core';

import { loadConfig, resolveCredentials, type Env } from '../context.js';

const surfaceJson = JSON.stringify({
  login: {
    url: 'https://portal.example.com/login',
    usernameSelector: '#user',
    passwordSelector: '#password',
    submitSelector: '#login',
    successSelector: '#dashboard',
  },
  navigation: { readySelector: '#attendance' },
  status: { enterButton: '#clock-in', exitButton: '#clock-out' },
  signals: {},
});

const baseEnv: Env = {
  PORTAL_USERNAME: 'jdoe',
  PORTAL_PASSWORD: 'test-secret',
};

function files(contents: Record<string, string>) {
  return vi.fn(async (path: string) => {
    const text = contents[path];
    if (text === undefined) {
      throw new Error(`ENOENT: no such file, open '${path}'`);
    }
    return text;
  });
}

describe('loadConfig', () => {
  it('applies defaults to a minimal environment', async () => {
    const readFile = files({ 'config/surface.json': surfaceJson });

    const config = await loadConfig(baseEnv, { readFile });

    expect(readFile).toHaveBeenCalledWith('config/surface.json');
    expect(config.environment).toBe('dev');
    expect(config.logLevel).toBe('info');
    expect(config.schedule).toEqual({
      enterTime: '09:00',
      exitTime: '18:00',
      enabled: true,
      weekdaysOnly: true,
      heartbeatIntervalMs: 300_000,
      misfireGraceMs: 30_000,
    });
    expect(config.retry).toEqual({
      maxAttempts: 3,
      baseDelayMs: 1000,
      maxDelayMs: 30_000,
      backoffBase: 2,
      jitter: true,
    });
    expect(config.verificationTimeoutMs).toBe(10_000);
    expect(config.circuit).toEqual({ failureThreshold: 5, recoveryTimeoutMs: 60_000 });
    expect(config.credentials).toEqual({
      kind: 'env',
      credentials: { username: 'jdoe', password: 'test-secret' },
    });
    expect(config.surface.login.timeoutMs).toBe(15_000);
    expect(config.surface.signals).toEqual({ success: [], failure: [], notice: [] });
    expect(config.notifications).toEqual({ providers: [], captureEvidence: false });
    expect(config.browser).toEqual({ headless: true, screenshotDir: 'screenshots' });
    expect(config.metricsEnabled).toBe(false);
  });

  it('reads overrides from the environment', async () => {
    const config = await loadConfig(
      {
        ...baseEnv,
        ENVIRONMENT: 'prod',
        LOG_LEVEL: 'DEBUG',
        CLOCK_IN_TIME: '08:30',
        WEEKDAYS_ONLY: 'no',
        SURFACE_PROFILE: 'surface.json',
        DISCORD_WEBHOOK_URL: 'https://discord.com/api/webhooks/1/test-token',
        NOTIFY_SUCCESS: 'off',
        CAPTURE_EVIDENCE: 'yes',
        BROWSER_CDP_URL: 'http://127.0.0.1:9222',
        HEADLESS: 'false',
        GPS_LATITUDE: '-33.8688',
        GPS_LONGITUDE: '151.2093',
        RETRY_MAX_ATTEMPTS: '5',
        CIRCUIT_FAILURE_THRESHOLD: '2',
        METRICS_ENABLED: '1',
      },
      { readFile: files({ 'surface.json': surfaceJson }) }
    );

    expect(config.environment).toBe('prod');
    expect(config.logLevel).toBe('debug');
    expect(config.schedule.enterTime).toBe('08:30');
    expect(config.schedule.weekdaysOnly).toBe(false);
    expect(config.retry.maxAttempts).toBe(5);
    expect(config.circuit.failureThreshold).toBe(2);
    expect(config.notifications).toEqual({
      providers: [
        {
          type: 'discord',
          url: 'https://discord.com/api/webhooks/1/test-token',
          enabled: true,
          notifySuccess: false,
          notifyFailure: true,
          notifyWarnings: true,
          notifyScheduler: true,
        },
      ],
      captureEvidence: true,
    });
    expect(config.browser).toEqual({
      cdpEndpoint: 'http://127.0.0.1:9222',
      headless: false,
      screenshotDir: 'screenshots',
      geolocation: { latitude: -33.8688, longitude: 151.2093 },
    });
    expect(config.metricsEnabled).toBe(true);
  });

  it('takes credentials from a secret when one is named', async () => {
    const config = await loadConfig(
      { CREDENTIALS_SECRET_ID: 'portal/credentials' },
      { readFile: files({ 'config/surface.json': surfaceJson }) }
    );

    expect(config.credentials).toEqual({ kind: 'secret', secretId: 'portal/credentials' });
  });

  it('loads notification settings from a file', async () => {
    const readFile = files({
      'config/surface.json': surfaceJson,
      'notifications.json': JSON.stringify({
        providers: [
          { type: 'webhook', url: 'https://hooks.example.com/shiftclock', notifyScheduler: false },
        ],
      }),
    });

    const config = await loadConfig(
      { ...baseEnv, NOTIFICATIONS_FILE: 'notifications.json', CAPTURE_EVIDENCE: 'true' },
      { readFile }
    );

    expect(config.notifications).toEqual({
      providers: [
        {
          type: 'webhook',
          name: 'webhook',
          url: 'https://hooks.example.com/shiftclock',
          enabled: true,
          notifySuccess: true,
          notifyFailure: true,
          notifyWarnings: true,
          notifyScheduler: false,
        },
      ],
      captureEvidence: true,
    });
  });

  it('requires credentials when no secret is named', async () => {
    const error = await loadConfig({}, { readFile: files({}) }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toHaveProperty(
      'message',
      'Invalid credentials (PORTAL_USERNAME / PORTAL_PASSWORD): username: Required; password: Required'
    );
  });

  it('rejects a malformed flag', async () => {
    await expect(
      loadConfig({ ...baseEnv, SCHEDULE_ENABLED: 'maybe' }, { readFile: files({}) })
    ).rejects.toThrow('Invalid environment: SCHEDULE_ENABLED: Expected true or false');
  });

  it('rejects an invalid time of day', async () => {
    await expect(
      loadConfig({ ...baseEnv, CLOCK_OUT_TIME: '25:00' }, { readFile: files({}) })
    ).rejects.toThrow('Invalid schedule: exitTime: Expected a 24-hour time as HH:MM');
  });

  it('requires both coordinates', async () => {
    await expect(
      loadConfig({ ...baseEnv, GPS_LATITUDE: '-33.8688' }, { readFile: files({}) })
    ).rejects.toThrow(
      'Invalid environment: GPS_LATITUDE and GPS_LONGITUDE must be set together'
    );
  });

  it('reports an unreadable surface profile', async () => {
    await expect(loadConfig(baseEnv, { readFile: files({}) })).rejects.toThrow(
      "Cannot read config/surface.json: ENOENT: no such file, open 'config/surface.json'"
    );
  });

  it('reports a surface profile that is not JSON', async () => {
    await expect(
      loadConfig(baseEnv, { readFile: files({ 'config/surface.json': 'login:' }) })
    ).rejects.toThrow('Invalid JSON in config/surface.json: ');
  });

  it('validates the surface profile', async () => {
    await expect(
      loadConfig(baseEnv, {
        readFile: files({ 'config/surface.json': JSON.stringify({ login: {} }) }),
      })
    ).rejects.toThrow(/^Invalid surface profile: login\.url: Required/);
  });
});

describe('resolveCredentials', () => {
  it('returns environment credentials as they are', async () => {
    const getSecret = vi.fn();

    await expect(
      resolveCredentials(
        { kind: 'env', credentials: { username: 'jdoe', password: 'test-secret' } },
        getSecret
      )
    ).resolves.toEqual({ username: 'jdoe', password: 'test-secret' });
    expect(getSecret).not.toHaveBeenCalled();
  });

  it('parses the secret value', async () => {
    const getSecret = vi
      .fn()
      .mockResolvedValue('{"username":"jdoe","password":"test-secret","organization":"acme"}');

    await expect(
      resolveCredentials({ kind: 'secret', secretId: 'portal/credentials' }, getSecret)
    ).resolves.toEqual({ username: 'jdoe', password: 'test-secret', organization: 'acme' });
  });

  it('rejects a secret that is not JSON', async () => {
    const getSecret = vi.fn().mockResolvedValue('jdoe:test-secret');

    await expect(
      resolveCredentials({ kind: 'secret', secretId: 'portal/credentials' }, getSecret)
    ).rejects.toThrow('Secret portal/credentials is not JSON: ');
  });
});
