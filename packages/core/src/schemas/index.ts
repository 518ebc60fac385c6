/**
 * Zod validation schemas for shiftclock
 *
 * Runtime validation for configuration handed to the core at startup and
 * for data read back from the remote surface.
 */

import { z } from 'zod';

import { ConfigurationError, MalformedStatusError } from '../errors.js';
import type {
  Credentials,
  RetryConfig,
  ScheduleConfig,
  StatusSnapshot,
} from '../types/index.js';

// ============================================================================
// Primitive Schemas
// ============================================================================

export const ActionSchema = z.enum(['enter', 'exit', 'simulate']);

export const RealActionSchema = z.enum(['enter', 'exit']);

export const NotificationLevelSchema = z.enum(['success', 'warning', 'error', 'info']);

/** 24-hour HH:MM */
export const TimeOfDaySchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected a 24-hour time as HH:MM');

const SelectorSchema = z.string().min(1);

// ============================================================================
// Resilience
// ============================================================================

export const RetryConfigSchema = z
  .object({
    maxAttempts: z.number().int().min(1),
    baseDelayMs: z.number().min(0),
    maxDelayMs: z.number().min(0),
    backoffBase: z.number().min(1),
    jitter: z.boolean(),
  })
  .refine((config) => config.maxDelayMs >= config.baseDelayMs, {
    message: 'maxDelayMs must be at least baseDelayMs',
    path: ['maxDelayMs'],
  }) satisfies z.ZodType<RetryConfig>;

export const CircuitBreakerConfigSchema = z.object({
  failureThreshold: z.number().int().min(1),
  recoveryTimeoutMs: z.number().int().min(0),
});

// ============================================================================
// Scheduling
// ============================================================================

export const ScheduleConfigSchema = z.object({
  enterTime: TimeOfDaySchema,
  exitTime: TimeOfDaySchema,
  enabled: z.boolean(),
  weekdaysOnly: z.boolean(),
  heartbeatIntervalMs: z.number().int().positive(),
  misfireGraceMs: z.number().int().min(0),
}) satisfies z.ZodType<ScheduleConfig>;

// ============================================================================
// Credentials and status
// ============================================================================

export const CredentialsSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
  organization: z.string().min(1).optional(),
}) satisfies z.ZodType<Credentials>;

export const StatusSnapshotSchema = z.object({
  enterAvailable: z.boolean(),
  exitAvailable: z.boolean(),
  pageLoaded: z.boolean(),
  positionReady: z.boolean(),
  remoteTime: z.string().nullable(),
  remoteDate: z.string().nullable(),
  locationText: z.string().nullable(),
  capturedAt: z.string().datetime(),
}) satisfies z.ZodType<StatusSnapshot>;

// ============================================================================
// Notifications
// ============================================================================

export const NotificationTogglesSchema = z.object({
  enabled: z.boolean().default(true),
  notifySuccess: z.boolean().default(true),
  notifyFailure: z.boolean().default(true),
  notifyWarnings: z.boolean().default(true),
  notifyScheduler: z.boolean().default(true),
});

const DeliverySettingsSchema = z.object({
  retry: RetryConfigSchema.optional(),
  minIntervalMs: z.number().int().min(0).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export const DiscordProviderConfigSchema = NotificationTogglesSchema.merge(
  DeliverySettingsSchema
).extend({
  type: z.literal('discord'),
  url: z
    .string()
    .url()
    .refine((url) => url.startsWith('https://discord.com/api/webhooks/'), {
      message: 'Expected a https://discord.com/api/webhooks/ URL',
    }),
  username: z.string().min(1).optional(),
});

export const WebhookProviderConfigSchema = NotificationTogglesSchema.merge(
  DeliverySettingsSchema
).extend({
  type: z.literal('webhook'),
  name: z.string().min(1).default('webhook'),
  url: z.string().url(),
  headers: z.record(z.string()).optional(),
});

export const EmailProviderConfigSchema = NotificationTogglesSchema.merge(
  DeliverySettingsSchema
).extend({
  type: z.literal('email'),
  region: z.string().min(1).optional(),
  fromAddress: z.string().email(),
  to: z.array(z.string().email()).min(1),
});

export const ProviderConfigSchema = z.discriminatedUnion('type', [
  DiscordProviderConfigSchema,
  WebhookProviderConfigSchema,
  EmailProviderConfigSchema,
]);

export const NotificationSettingsSchema = z.object({
  providers: z.array(ProviderConfigSchema).default([]),
  /** Attach screenshots to run notifications */
  captureEvidence: z.boolean().default(false),
});

export type NotificationSettings = z.infer<typeof NotificationSettingsSchema>;
export type DiscordProviderConfig = z.infer<typeof DiscordProviderConfigSchema>;
export type WebhookProviderConfig = z.infer<typeof WebhookProviderConfigSchema>;
export type EmailProviderConfig = z.infer<typeof EmailProviderConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

// ============================================================================
// Surface profile
// ============================================================================

/**
 * Page structure of the target application. Pure configuration: the
 * selectors are handed to the session driver unchanged.
 */
export const SurfaceProfileSchema = z.object({
  login: z.object({
    url: z.string().url(),
    usernameSelector: SelectorSchema,
    passwordSelector: SelectorSchema,
    organizationSelector: SelectorSchema.optional(),
    submitSelector: SelectorSchema,
    /** Visible once the session is authenticated */
    successSelector: SelectorSchema,
    /** Visible when the credentials were refused */
    rejectionSelector: SelectorSchema.optional(),
    timeoutMs: z.number().int().positive().default(15_000),
  }),
  navigation: z.object({
    url: z.string().url().optional(),
    entrySelector: SelectorSchema.optional(),
    readySelector: SelectorSchema,
    timeoutMs: z.number().int().positive().default(15_000),
  }),
  positioning: z
    .object({
      triggerSelector: SelectorSchema,
      readySelector: SelectorSchema.optional(),
      timeoutMs: z.number().int().positive().default(5_000),
    })
    .optional(),
  status: z.object({
    enterButton: SelectorSchema,
    exitButton: SelectorSchema,
    pageTitle: SelectorSchema.optional(),
    remoteTime: SelectorSchema.optional(),
    remoteDate: SelectorSchema.optional(),
    location: SelectorSchema.optional(),
    positionReady: SelectorSchema.optional(),
    timeoutMs: z.number().int().positive().default(10_000),
  }),
  signals: z.object({
    success: z.array(SelectorSchema).default([]),
    failure: z.array(SelectorSchema).default([]),
    notice: z.array(SelectorSchema).default([]),
  }),
});

export type SurfaceProfile = z.infer<typeof SurfaceProfileSchema>;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Parse a value or throw a ConfigurationError listing every issue
 */
export function parseConfig<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  label: string
): z.output<T> {
  const result = schema.safeParse(value);

  if (result.success) {
    return result.data;
  }

  const issues = result.error.errors.map(
    (e) => `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`
  );
  throw new ConfigurationError(`Invalid ${label}`, issues);
}

/**
 * Validate a status snapshot read from the surface
 *
 * @throws {MalformedStatusError} naming the fields that failed
 */
export function parseStatusSnapshot(raw: unknown): StatusSnapshot {
  const parsed = StatusSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedStatusError(
      `malformed status snapshot: ${parsed.error.errors.map((e) => e.path.join('.')).join(', ')}`
    );
  }
  return parsed.data;
}
