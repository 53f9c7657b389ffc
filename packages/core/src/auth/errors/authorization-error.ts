/**
 * Error codes for a failed reauthorization attempt
 */
export enum AuthorizationErrorCode {
  /** The provider reported an error */
  AUTHORIZATION_FAILED = 'authorization_failed',
  /** The provider finished with a status outside [200, 300), or with none */
  AUTHORIZATION_REJECTED = 'authorization_rejected',
  /** The provider cannot obtain authorization at all */
  NOT_SUPPORTED = 'not_supported',
}

/**
 * Error delivered to the caller when answering an authorization challenge fails.
 * Messages never carry tokens: provider messages are sanitized on the way in.
 */
export class AuthorizationError extends Error {
  public readonly code: AuthorizationErrorCode;
  public readonly statusCode?: number;
  public readonly cause?: Error;

  public constructor(
    message: string,
    code: AuthorizationErrorCode = AuthorizationErrorCode.AUTHORIZATION_FAILED,
    statusCode?: number,
    cause?: Error,
  ) {
    super(AuthorizationError.sanitizeMessage(message));
    this.name = 'AuthorizationError';
    this.code = code;
    this.statusCode = statusCode;
    this.cause = cause;

    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }

  /**
   * Strips bearer tokens and token-like parameters from a message
   */
  private static sanitizeMessage(message: string): string {
    return message
      .replace(/\bBearer\s+[a-zA-Z0-9._~+/-]+=*/gi, 'Bearer [REDACTED]')
      .replace(/\baccess_token[=:]\s*[^\s&]+/gi, 'access_token=[REDACTED]')
      .replace(/\brefresh_token[=:]\s*[^\s&]+/gi, 'refresh_token=[REDACTED]')
      .replace(/\bclient_secret[=:]\s*[^\s&]+/gi, 'client_secret=[REDACTED]');
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      cause: this.cause?.message,
    };
  }

  /**
   * The provider's authorization attempt ended in an error
   */
  public static providerFailed(cause: Error): AuthorizationError {
    return new AuthorizationError(
      `Authorization process failed: ${cause.message}`,
      AuthorizationErrorCode.AUTHORIZATION_FAILED,
      undefined,
      cause,
    );
  }

  /**
   * The provider's authorization attempt finished unsuccessfully
   */
  public static rejected(statusCode: number | undefined): AuthorizationError {
    const message =
      statusCode === undefined
        ? 'Authorization process finished without a response'
        : `Authorization process failed with status ${statusCode}`;
    return new AuthorizationError(message, AuthorizationErrorCode.AUTHORIZATION_REJECTED, statusCode);
  }

  public static notSupported(): AuthorizationError {
    return new AuthorizationError(
      'No authorization provider is configured',
      AuthorizationErrorCode.NOT_SUPPORTED,
    );
  }
}
