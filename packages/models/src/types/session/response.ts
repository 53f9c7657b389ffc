import type { HttpHeaders } from './request.js';

/**
 * Response received over HTTP(S).
 */
export interface HttpSessionResponse {
  readonly kind: 'http';
  readonly url: string;
  readonly status: number;
  readonly statusText: string;
  readonly headers: HttpHeaders;
  readonly body?: Uint8Array;
}

/**
 * Response from a non-HTTP scheme (no status line, no headers).
 */
export interface OpaqueSessionResponse {
  readonly kind: 'opaque';
  readonly url: string;
  readonly body?: Uint8Array;
}

export type SessionResponse = HttpSessionResponse | OpaqueSessionResponse;

/**
 * Callback invoked once a task finishes. Exactly one of the two arguments
 * is normally set; transports may report a response together with an error.
 */
export type CompletionHandler = (
  response: SessionResponse | undefined,
  error: Error | undefined,
) => void;
