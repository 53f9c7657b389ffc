/**
 * NoAuthorizationProvider - provider for sessions that only need analytics headers
 */

import type {
  AuthorizationCompletionHandler,
  IAuthorizationProvider,
} from '@session-guard/models';
import { AuthorizationError } from './errors/authorization-error.js';

/**
 * Authorization provider that never authorizes.
 *
 * Holds no token, never classifies a response as a challenge, and answers
 * any authorization request with a `not_supported` error.
 */
export class NoAuthorizationProvider implements IAuthorizationProvider {
  public cachedAuthorizationHeader(): string | undefined {
    return undefined;
  }

  public isAuthorizationRequired(): boolean {
    return false;
  }

  public obtainAuthorization(onComplete: AuthorizationCompletionHandler): void {
    onComplete(undefined, AuthorizationError.notSupported());
  }
}
