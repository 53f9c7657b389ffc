/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Uses fast-redact (bundled with pino) for path-based redaction of
 * authorization headers and credentials carried on requests.
 */

import pino from 'pino';
import { LogLevelSchema } from '@session-guard/schemas';

/**
 * Paths censored in every log record.
 * @public
 */
export const REDACTED_PATHS: readonly string[] = [
  // Authorization headers, in both spellings transports produce
  'authorization',
  '*.authorization',
  'Authorization',
  '*.Authorization',
  'headers.authorization',
  'headers.Authorization',
  '*.headers.authorization',
  '*.headers.Authorization',
  'cookie',
  '*.cookie',
  'headers.cookie',
  '*.headers.cookie',

  // Tokens & credentials
  'token',
  '*.token',
  'access_token',
  '*.access_token',
  'refresh_token',
  '*.refresh_token',
  'password',
  '*.password',
  'client_secret',
  '*.client_secret',
  'api_key',
  '*.api_key',
  '*.secret',
  '*.SECRET',
];

/**
 * Creates a pino logger carrying the session-guard redaction rules.
 *
 * @param level - Initial level
 * @param destination - Optional destination stream (stdout when omitted)
 * @public
 */
export function createLogger(
  level: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level,
    redact: {
      paths: [...REDACTED_PATHS],
      censor: '[REDACTED]',
      remove: false,
    },
    serializers: {
      ...pino.stdSerializers,
      err: pino.stdSerializers.err,
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

/**
 * Resolves the initial level from SESSION_GUARD_LOG_LEVEL, falling back to
 * 'silent' when unset or not a pino level.
 * @internal
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): string {
  const parsed = LogLevelSchema.safeParse(env.SESSION_GUARD_LOG_LEVEL?.toLowerCase());
  return parsed.success ? parsed.data : 'silent';
}

/**
 * Root logger instance with automatic redaction of sensitive data.
 *
 * Silent by default. Set SESSION_GUARD_LOG_LEVEL, or assign `level`, to
 * see output.
 *
 * @example
 * ```typescript
 * rootLogger.level = 'debug';
 * rootLogger.info({ headers: { Authorization: 'Bearer abc' } });
 * // Logs: { headers: { Authorization: '[REDACTED]' } }
 * ```
 * @public
 */
const rootLogger = createLogger(resolveLogLevel());

export { rootLogger };
