/**
 * @shiftclock/core
 *
 * Action orchestration and resilience engine: retries, circuit breaking,
 * confirmation, verification, scheduling and notification fan-out, plus
 * the driver seam the runner plugs a browser into.
 */

// Types and schemas
export * from './types/index.js';
export * from './schemas/index.js';
export * from './constants.js';
export * from './errors.js';

// Logging
export {
  Logger,
  logger,
  createSilentLogger,
  parseLogLevel,
  type LogLevel,
  type LoggerOptions,
} from './logging/logger.js';

// Resilience
export * from './resilience/index.js';

// Run pipeline
export * from './confirmation/index.js';
export * from './verification/index.js';
export * from './orchestration/index.js';
export * from './surface/index.js';

// Scheduling
export * from './scheduling/index.js';

// Notifications
export * from './notifications/index.js';
export {
  SESClient,
  toDeliveryError,
  type EmailContent,
  type SESConfig,
} from './integrations/ses.js';
