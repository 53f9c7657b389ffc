/**
 * Transport-specific error codes for the failures a transport session reports
 */
export enum TransportErrorCode {
  CONNECTION_FAILED = 'connection_failed',
  REQUEST_TIMEOUT = 'request_timeout',
  REQUEST_CANCELLED = 'request_cancelled',
  INVALID_URL = 'invalid_url',
  INVALID_REQUEST = 'invalid_request',
  SESSION_INVALIDATED = 'session_invalidated',
  UNKNOWN_ERROR = 'unknown_error',
}

/**
 * Transport error class that extends base Error with transport-specific error codes.
 * Includes retry indication for retryable vs non-retryable errors.
 */
export class TransportError extends Error {
  public readonly code: TransportErrorCode;
  public readonly isRetryable: boolean;
  public readonly cause?: Error;

  public constructor(
    message: string,
    code: TransportErrorCode = TransportErrorCode.UNKNOWN_ERROR,
    isRetryable: boolean = false,
    cause?: Error,
  ) {
    super(message);
    this.name = 'TransportError';
    this.code = code;
    this.isRetryable = isRetryable;
    this.cause = cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, TransportError.prototype);
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   * @returns JSON object containing error details
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isRetryable: this.isRetryable,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  public static connectionFailed(m: string, c?: Error): TransportError {
    return new TransportError(
      `Connection failed: ${m}`,
      TransportErrorCode.CONNECTION_FAILED,
      true,
      c,
    );
  }

  public static requestTimeout(t: number, c?: Error): TransportError {
    return new TransportError(
      `Request timeout after ${t}ms`,
      TransportErrorCode.REQUEST_TIMEOUT,
      true,
      c,
    );
  }

  public static requestCancelled(c?: Error): TransportError {
    return new TransportError(
      'Request was cancelled',
      TransportErrorCode.REQUEST_CANCELLED,
      false,
      c,
    );
  }

  public static invalidUrl(u: string, c?: Error): TransportError {
    return new TransportError(
      `Invalid URL: ${u}`,
      TransportErrorCode.INVALID_URL,
      false,
      c,
    );
  }

  public static invalidRequest(m: string, c?: Error): TransportError {
    return new TransportError(
      `Invalid request: ${m}`,
      TransportErrorCode.INVALID_REQUEST,
      false,
      c,
    );
  }

  public static sessionInvalidated(): TransportError {
    return new TransportError(
      'Session was invalidated',
      TransportErrorCode.SESSION_INVALIDATED,
      false,
    );
  }
}
