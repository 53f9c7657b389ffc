import type { HttpSessionResponse } from '@session-guard/models';

/**
 * Converts the head of a fetch Response. Header names come out lower-cased.
 * @internal
 */
export function toSessionResponse(response: Response, requestUrl: string): HttpSessionResponse {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, name) => {
    headers[name] = value;
  });

  return {
    kind: 'http',
    url: response.url || requestUrl,
    status: response.status,
    statusText: response.statusText,
    headers: Object.freeze(headers),
  };
}
