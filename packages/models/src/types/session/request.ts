/**
 * Request types shared by the session decorator and transport implementations.
 */

export type HttpMethod =
  | 'GET'
  | 'HEAD'
  | 'POST'
  | 'PUT'
  | 'PATCH'
  | 'DELETE'
  | 'OPTIONS';

/**
 * Header name to value mapping. Lookups by name are case-insensitive.
 */
export type HttpHeaders = Readonly<Record<string, string>>;

/**
 * Body of a request: either bytes held in memory or a file on disk.
 */
export type RequestBody =
  | { readonly type: 'data'; readonly data: Uint8Array }
  | { readonly type: 'file'; readonly path: string };

/**
 * Body of an upload task. In-memory uploads may carry no data at all.
 */
export type UploadSource =
  | { readonly type: 'data'; readonly data?: Uint8Array }
  | { readonly type: 'file'; readonly path: string };

/**
 * Immutable outbound request.
 */
export interface SessionRequest {
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers: HttpHeaders;
  readonly body?: RequestBody;
}
