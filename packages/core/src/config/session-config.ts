import type { ZodIssue } from 'zod';
import { SessionConfigSchema, type SessionConfig, type SessionConfigInput } from '@session-guard/schemas';

/**
 * Error thrown when a session configuration fails validation.
 * @public
 */
export class SessionConfigError extends Error {
  public constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = 'SessionConfigError';
    Object.setPrototypeOf(this, SessionConfigError.prototype);
  }

  public static fromIssues(issues: readonly ZodIssue[]): SessionConfigError {
    const formatted = issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    return new SessionConfigError(
      `Invalid session configuration: ${formatted.join('; ')}`,
      formatted,
    );
  }
}

/**
 * Reads the configuration values the environment may set.
 *
 * SESSION_GUARD_TIMEOUT_MS - per-request timeout in milliseconds
 * SESSION_GUARD_LOG_LEVEL - pino level for session components
 * @internal
 */
function readEnvironment(env: Record<string, string | undefined>): Record<string, unknown> {
  const fromEnv: Record<string, unknown> = {};
  const timeout = env.SESSION_GUARD_TIMEOUT_MS;
  if (timeout !== undefined && timeout.trim() !== '') {
    fromEnv.timeout = Number(timeout);
  }
  const logLevel = env.SESSION_GUARD_LOG_LEVEL;
  if (logLevel !== undefined && logLevel.trim() !== '') {
    fromEnv.logLevel = logLevel.trim().toLowerCase();
  }
  return fromEnv;
}

/**
 * Builds a validated session configuration.
 *
 * Explicit input wins over environment values; schema defaults fill the rest.
 * @param input - Explicit configuration
 * @param env - Environment source, process.env by default
 * @throws \{SessionConfigError\} When the merged configuration is invalid
 * @public
 */
export function loadSessionConfig(
  input: SessionConfigInput = {},
  env: Record<string, string | undefined> = process.env,
): SessionConfig {
  const explicit = Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined),
  );
  const result = SessionConfigSchema.safeParse({ ...readEnvironment(env), ...explicit });
  if (!result.success) {
    throw SessionConfigError.fromIssues(result.error.issues);
  }
  return result.data;
}
