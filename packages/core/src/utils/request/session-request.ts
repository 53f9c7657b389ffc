import type { HttpHeaders, HttpMethod, RequestBody, SessionRequest } from '@session-guard/models';
import { TransportError } from '../../transports/errors/transport-error.js';
import { mergeHeaders } from './headers.js';

export interface SessionRequestInit {
  method?: HttpMethod;
  headers?: HttpHeaders;
  body?: RequestBody;
}

/**
 * Builds a frozen request.
 * @param url - Absolute URL
 * @param init - Method (GET by default), headers and body
 * @throws \{TransportError\} When the URL cannot be parsed
 * @public
 */
export function createSessionRequest(url: string | URL, init: SessionRequestInit = {}): SessionRequest {
  let href: string;
  try {
    href = new URL(url).href;
  } catch (error) {
    throw TransportError.invalidUrl(String(url), error instanceof Error ? error : undefined);
  }

  const request: SessionRequest = {
    url: href,
    method: init.method ?? 'GET',
    headers: Object.freeze({ ...init.headers }),
    ...(init.body ? { body: init.body } : {}),
  };
  return Object.freeze(request);
}

/**
 * Returns a copy of `request` carrying the given headers. The original is
 * left untouched; url, method and body are shared with the copy.
 * @public
 */
export function withHeaders(
  request: SessionRequest,
  additions: Readonly<Record<string, string>>,
): SessionRequest {
  return Object.freeze({ ...request, headers: mergeHeaders(request.headers, additions) });
}
