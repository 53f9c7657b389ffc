import type {
  CompletionHandler,
  IAuthorizationProvider,
  SessionRequest,
  UploadSource,
} from '@session-guard/models';
import { isAuthorizationChallenge } from './challenge-detector.js';
import type { ChallengeHandler } from './challenge-handler.js';

export interface ChallengeAwareCompletionOptions {
  /** The undecorated request, resubmitted if a challenge arrives */
  request: SessionRequest;
  source?: UploadSource;
  completion: CompletionHandler;
  authorizationProvider: IAuthorizationProvider;
  challengeHandler: ChallengeHandler;
}

/**
 * Wraps a caller's completion handler so that a challenge response starts
 * the reauthorization cycle instead of reaching the caller. Every other
 * outcome is passed through unchanged.
 *
 * If reauthorization fails the caller receives `(undefined, AuthorizationError)`.
 * @public
 */
export function createChallengeAwareCompletionHandler(
  options: ChallengeAwareCompletionOptions,
): CompletionHandler {
  const { request, source, completion, authorizationProvider, challengeHandler } = options;

  return (response, error) => {
    if (!isAuthorizationChallenge(response, authorizationProvider)) {
      completion(response, error);
      return;
    }

    challengeHandler.handle({
      request,
      source,
      completion,
      onFailure: (failure) => completion(undefined, failure),
    });
  };
}
