import type { IAuthorizationProvider, SessionResponse } from '@session-guard/models';
import { getHeader } from '../utils/request/headers.js';
import { WWW_AUTHENTICATE_HEADER } from './constants.js';

/**
 * Classifies a response as an authorization challenge the provider can answer.
 *
 * True only for an HTTP response carrying a `WWW-Authenticate` header for
 * which `isAuthorizationRequired(status, header)` holds. The predicate is
 * not consulted when an earlier condition fails.
 * @public
 */
export function isAuthorizationChallenge(
  response: SessionResponse | undefined,
  authorizationProvider: Pick<IAuthorizationProvider, 'isAuthorizationRequired'>,
): boolean {
  if (response === undefined) {
    return false;
  }
  if (response.kind !== 'http') {
    return false;
  }

  const challenge = getHeader(response.headers, WWW_AUTHENTICATE_HEADER);
  if (challenge === undefined) {
    return false;
  }

  return authorizationProvider.isAuthorizationRequired(response.status, challenge);
}
