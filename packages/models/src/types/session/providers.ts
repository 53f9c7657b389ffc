import type { HttpHeaders } from './request.js';

/**
 * Outcome of an authorization attempt as reported by the provider.
 */
export interface AuthorizationResponse {
  readonly statusCode: number;
  readonly headers?: HttpHeaders;
}

export type AuthorizationCompletionHandler = (
  response: AuthorizationResponse | undefined,
  error: Error | undefined,
) => void;

/**
 * Owner of the authorization token cache and its refresh logic.
 */
export interface IAuthorizationProvider {
  /**
   * The cached value for the `Authorization` header, if any.
   */
  cachedAuthorizationHeader(): string | undefined;

  /**
   * Decides whether a response with the given status and
   * `WWW-Authenticate` value is a challenge this provider can answer.
   */
  isAuthorizationRequired(statusCode: number, wwwAuthenticateHeader: string): boolean;

  /**
   * Starts an authorization attempt. `onComplete` is called once when it
   * finishes; on success the cached header reflects the new token.
   */
  obtainAuthorization(onComplete: AuthorizationCompletionHandler): void;
}

/**
 * Source of the analytics metadata attached to outgoing requests.
 */
export interface IAnalyticsMetadataProvider {
  currentAnalyticsMetadata(): string | undefined;
}
