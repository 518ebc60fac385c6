/**
 * Runner configuration
 *
 * Everything the runner needs comes from the environment, plus two JSON
 * files named by it: the surface profile and, optionally, the notification
 * settings. Every value passes through a core zod schema.
 */

import { readFile } from 'node:fs/promises';

import {
  CIRCUIT,
  CircuitBreakerConfigSchema,
  ConfigurationError,
  CredentialsSchema,
  DEFAULT_STEP_RETRY,
  Logger,
  NotificationSettingsSchema,
  RetryConfigSchema,
  SCHEDULE,
  ScheduleConfigSchema,
  SurfaceProfileSchema,
  VERIFICATION,
  errorMessage,
  parseConfig,
  parseLogLevel,
  type Credentials,
  type NotificationSettings,
} from '@shiftclock/core';
import { z } from 'zod';

import type { CredentialSource, RunnerConfig } from './types.js';

export type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  readFile?: (path: string) => Promise<string>;
}

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

const flagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value), {
    message: 'Expected true or false',
  })
  .transform((value) => TRUE_VALUES.includes(value));

const integerSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'Expected a non-negative integer')
  .transform(Number);

const coordinateSchema = z
  .string()
  .trim()
  .regex(/^-?\d+(\.\d+)?$/, 'Expected a decimal coordinate')
  .transform(Number);

const EnvSchema = z.object({
  ENVIRONMENT: z.string().min(1).default('dev'),
  LOG_LEVEL: z.string().optional(),

  CLOCK_IN_TIME: z.string().default('09:00'),
  CLOCK_OUT_TIME: z.string().default('18:00'),
  SCHEDULE_ENABLED: flagSchema.default('true'),
  WEEKDAYS_ONLY: flagSchema.default('true'),
  HEARTBEAT_INTERVAL_MS: integerSchema.default(String(SCHEDULE.HEARTBEAT_INTERVAL_MS)),
  MISFIRE_GRACE_MS: integerSchema.default(String(SCHEDULE.MISFIRE_GRACE_MS)),

  PORTAL_USERNAME: z.string().optional(),
  PORTAL_PASSWORD: z.string().optional(),
  PORTAL_ORGANIZATION: z.string().optional(),
  CREDENTIALS_SECRET_ID: z.string().min(1).optional(),

  SURFACE_PROFILE: z.string().min(1).default('config/surface.json'),
  NOTIFICATIONS_FILE: z.string().min(1).optional(),
  DISCORD_WEBHOOK_URL: z.string().optional(),
  NOTIFY_SUCCESS: flagSchema.default('true'),
  NOTIFY_FAILURE: flagSchema.default('true'),
  NOTIFY_WARNINGS: flagSchema.default('true'),
  NOTIFY_SCHEDULER: flagSchema.default('true'),
  CAPTURE_EVIDENCE: flagSchema.optional(),

  BROWSER_CDP_URL: z.string().url().optional(),
  BROWSER_EXECUTABLE_PATH: z.string().min(1).optional(),
  HEADLESS: flagSchema.default('true'),
  SCREENSHOT_DIR: z.string().min(1).default('screenshots'),
  GPS_LATITUDE: coordinateSchema.optional(),
  GPS_LONGITUDE: coordinateSchema.optional(),

  RETRY_MAX_ATTEMPTS: integerSchema.default(String(DEFAULT_STEP_RETRY.maxAttempts)),
  RETRY_BASE_DELAY_MS: integerSchema.default(String(DEFAULT_STEP_RETRY.baseDelayMs)),
  RETRY_MAX_DELAY_MS: integerSchema.default(String(DEFAULT_STEP_RETRY.maxDelayMs)),
  VERIFICATION_TIMEOUT_MS: integerSchema.default(String(VERIFICATION.TIMEOUT_MS)),
  CIRCUIT_FAILURE_THRESHOLD: integerSchema.default(String(CIRCUIT.FAILURE_THRESHOLD)),
  CIRCUIT_RECOVERY_MS: integerSchema.default(String(CIRCUIT.RECOVERY_TIMEOUT_MS)),

  METRICS_ENABLED: flagSchema.default('false'),
});

type ParsedEnv = z.output<typeof EnvSchema>;

const defaultReadFile = (path: string): Promise<string> => readFile(path, 'utf8');

async function readJsonFile(
  path: string,
  read: (path: string) => Promise<string>
): Promise<unknown> {
  let text: string;
  try {
    text = await read(path);
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${path}`, [errorMessage(error)]);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${path}`, [errorMessage(error)]);
  }
}

function credentialSource(env: ParsedEnv): CredentialSource {
  if (env.CREDENTIALS_SECRET_ID) {
    return { kind: 'secret', secretId: env.CREDENTIALS_SECRET_ID };
  }
  return {
    kind: 'env',
    credentials: parseConfig(
      CredentialsSchema,
      {
        username: env.PORTAL_USERNAME,
        password: env.PORTAL_PASSWORD,
        organization: env.PORTAL_ORGANIZATION || undefined,
      },
      'credentials (PORTAL_USERNAME / PORTAL_PASSWORD)'
    ),
  };
}

async function notificationSettings(
  env: ParsedEnv,
  read: (path: string) => Promise<string>
): Promise<NotificationSettings> {
  if (env.NOTIFICATIONS_FILE) {
    const settings = parseConfig(
      NotificationSettingsSchema,
      await readJsonFile(env.NOTIFICATIONS_FILE, read),
      'notification settings'
    );
    return env.CAPTURE_EVIDENCE === undefined
      ? settings
      : { ...settings, captureEvidence: env.CAPTURE_EVIDENCE };
  }

  return parseConfig(
    NotificationSettingsSchema,
    {
      providers: env.DISCORD_WEBHOOK_URL
        ? [
            {
              type: 'discord',
              url: env.DISCORD_WEBHOOK_URL,
              notifySuccess: env.NOTIFY_SUCCESS,
              notifyFailure: env.NOTIFY_FAILURE,
              notifyWarnings: env.NOTIFY_WARNINGS,
              notifyScheduler: env.NOTIFY_SCHEDULER,
            },
          ]
        : [],
      captureEvidence: env.CAPTURE_EVIDENCE ?? false,
    },
    'notification settings'
  );
}

/**
 * Load and validate the runner configuration
 *
 * @throws {ConfigurationError} listing every invalid or missing value
 */
export async function loadConfig(
  source: Env = process.env,
  options?: LoadConfigOptions
): Promise<RunnerConfig> {
  const read = options?.readFile ?? defaultReadFile;
  const env = parseConfig(EnvSchema, source, 'environment');

  if ((env.GPS_LATITUDE === undefined) !== (env.GPS_LONGITUDE === undefined)) {
    throw new ConfigurationError('Invalid environment', [
      'GPS_LATITUDE and GPS_LONGITUDE must be set together',
    ]);
  }

  return {
    environment: env.ENVIRONMENT,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    schedule: parseConfig(
      ScheduleConfigSchema,
      {
        enterTime: env.CLOCK_IN_TIME,
        exitTime: env.CLOCK_OUT_TIME,
        enabled: env.SCHEDULE_ENABLED,
        weekdaysOnly: env.WEEKDAYS_ONLY,
        heartbeatIntervalMs: env.HEARTBEAT_INTERVAL_MS,
        misfireGraceMs: env.MISFIRE_GRACE_MS,
      },
      'schedule'
    ),
    retry: parseConfig(
      RetryConfigSchema,
      {
        ...DEFAULT_STEP_RETRY,
        maxAttempts: env.RETRY_MAX_ATTEMPTS,
        baseDelayMs: env.RETRY_BASE_DELAY_MS,
        maxDelayMs: env.RETRY_MAX_DELAY_MS,
      },
      'retry settings'
    ),
    verificationTimeoutMs: env.VERIFICATION_TIMEOUT_MS,
    circuit: parseConfig(
      CircuitBreakerConfigSchema,
      {
        failureThreshold: env.CIRCUIT_FAILURE_THRESHOLD,
        recoveryTimeoutMs: env.CIRCUIT_RECOVERY_MS,
      },
      'circuit breaker settings'
    ),
    credentials: credentialSource(env),
    surface: parseConfig(
      SurfaceProfileSchema,
      await readJsonFile(env.SURFACE_PROFILE, read),
      'surface profile'
    ),
    notifications: await notificationSettings(env, read),
    browser: {
      ...(env.BROWSER_CDP_URL ? { cdpEndpoint: env.BROWSER_CDP_URL } : {}),
      ...(env.BROWSER_EXECUTABLE_PATH ? { executablePath: env.BROWSER_EXECUTABLE_PATH } : {}),
      headless: env.HEADLESS,
      screenshotDir: env.SCREENSHOT_DIR,
      ...(env.GPS_LATITUDE !== undefined && env.GPS_LONGITUDE !== undefined
        ? { geolocation: { latitude: env.GPS_LATITUDE, longitude: env.GPS_LONGITUDE } }
        : {}),
    },
    metricsEnabled: env.METRICS_ENABLED,
  };
}

/**
 * Resolve the portal credentials for one run
 *
 * @param getSecret - Secret lookup, normally the TTL cache
 */
export async function resolveCredentials(
  source: CredentialSource,
  getSecret: (secretId: string) => Promise<string>
): Promise<Credentials> {
  if (source.kind === 'env') {
    return source.credentials;
  }

  const raw = await getSecret(source.secretId);
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Secret ${source.secretId} is not JSON`, [errorMessage(error)]);
  }
  return parseConfig(CredentialsSchema, parsed, `credentials secret ${source.secretId}`);
}

export function createRunnerLogger(config: Pick<RunnerConfig, 'logLevel' | 'environment'>): Logger {
  return new Logger({
    level: config.logLevel,
    component: 'runner',
    bindings: { environment: config.environment },
  });
}
