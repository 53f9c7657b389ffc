import type { Logger } from 'pino';
import { rootLogger } from './logging/pino-setup.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Writes a structured log event on the root logger.
 * @param level - Log severity level
 * @param event - Event identifier for categorization
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(level: LogLevel, event: string, data?: Record<string, unknown>): void {
  rootLogger[level]({ event, ...data }, event);
}

/**
 * Logs an error event with its message and stack.
 * @param context - Contextual label identifying where the error occurred
 * @param rawError - The error object or value that was thrown
 * @param extra - Additional structured context
 * @public
 */
export function logError(context: string, rawError: unknown, extra?: Record<string, unknown>): void {
  const err = rawError instanceof Error ? rawError : new Error(String(rawError));
  rootLogger.error({ event: `error:${context}`, err, ...extra }, err.message);
}

/**
 * Logging abstraction handed to session components.
 *
 * Components log through this seam so callers can inject their own sink.
 * @public
 */
export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  /**
   * Log an error message.
   * @param message - The log message
   * @param error - Optional error object
   * @param context - Optional context object for structured logging
   */
  error(message: string, error?: Error | unknown, context?: Record<string, unknown>): void;
}

/**
 * ILogger backed by a pino logger.
 * @public
 */
export class PinoLogger implements ILogger {
  public constructor(private readonly logger: Logger) {}

  public debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context ?? {}, message);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context ?? {}, message);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context ?? {}, message);
  }

  public error(message: string, error?: Error | unknown, context?: Record<string, unknown>): void {
    const errorContext =
      error === undefined ? {} : { err: error instanceof Error ? error : new Error(String(error)) };
    this.logger.error({ ...context, ...errorContext }, message);
  }
}

/**
 * No-op logger implementation for testing or when logging is disabled.
 * @public
 */
export class NoOpLogger implements ILogger {
  public debug(): void {}
  public info(): void {}
  public warn(): void {}
  public error(): void {}
}

/**
 * Creates a logger scoped to one component, as a child of the root logger.
 * @param scope - Component name recorded on every line
 * @param level - Optional level overriding the root logger's for this scope
 * @public
 */
export function createScopedLogger(scope: string, level?: string): ILogger {
  const child = level ? rootLogger.child({ scope }, { level }) : rootLogger.child({ scope });
  return new PinoLogger(child);
}
