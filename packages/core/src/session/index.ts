export {
  AUTHORIZATION_HEADER,
  TRACKING_ID_HEADER,
  ANALYTICS_METADATA_HEADER,
  WWW_AUTHENTICATE_HEADER,
} from './constants.js';
export { RequestDecorator, type RequestDecoratorOptions } from './request-decorator.js';
export { isAuthorizationChallenge } from './challenge-detector.js';
export {
  ChallengeHandler,
  AuthorizationChallenge,
  type ChallengeHandlerOptions,
  type ChallengeContext,
  type ChallengeState,
  type ChallengeOutcome,
} from './challenge-handler.js';
export {
  createChallengeAwareCompletionHandler,
  type ChallengeAwareCompletionOptions,
} from './completion-handler.js';
export { ForwardingSessionDelegate } from './forwarding-delegate.js';
export { AuthorizedSession, type AuthorizedSessionConfig } from './authorized-session.js';
