/**
 * Logging infrastructure exports
 *
 * Provides structured logging with automatic redaction via pino + fast-redact
 */

export { rootLogger, createLogger, REDACTED_PATHS } from './pino-setup.js';

export {
  logEvent,
  logError,
  PinoLogger,
  NoOpLogger,
  createScopedLogger,
} from '../logger.js';
export type { LogLevel, ILogger } from '../logger.js';
