/**
 * Reauthorization protocol run when a response carries an authorization challenge.
 *
 * One AuthorizationChallenge exists per challenged request and moves
 * idle -> awaiting-authorization -> resolved. The original request is
 * resubmitted at most once and the retried response is not checked again.
 */

import type {
  AuthorizationResponse,
  CompletionHandler,
  IAuthorizationProvider,
  ISessionTask,
  ITransportSession,
  SessionRequest,
  UploadSource,
} from '@session-guard/models';
import { AuthorizationError } from '../auth/errors/authorization-error.js';
import { createScopedLogger, type ILogger } from '../logger.js';
import { withHeaders } from '../utils/request/session-request.js';
import { AUTHORIZATION_HEADER } from './constants.js';

export type ChallengeState = 'idle' | 'awaiting-authorization' | 'resolved';
export type ChallengeOutcome = 'retried' | 'failed';

export interface ChallengeHandlerOptions {
  transport: ITransportSession;
  authorizationProvider: IAuthorizationProvider;
  logger?: ILogger;
}

export interface ChallengeContext {
  /** The request as the caller issued it, before decoration */
  request: SessionRequest;
  /** Set when the challenged task was an upload */
  source?: UploadSource;
  /** Receives the retried response */
  completion: CompletionHandler;
  onFailure: (error: AuthorizationError) => void;
}

/**
 * @internal
 */
function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * State of one reauthorization attempt.
 * @public
 */
export class AuthorizationChallenge {
  private currentState: ChallengeState = 'idle';
  private currentOutcome?: ChallengeOutcome;
  private task?: ISessionTask;

  public constructor(
    private readonly options: Required<ChallengeHandlerOptions>,
    private readonly context: ChallengeContext,
  ) {}

  public get state(): ChallengeState {
    return this.currentState;
  }

  public get outcome(): ChallengeOutcome | undefined {
    return this.currentOutcome;
  }

  /** The resubmitted task, once the retry has been issued */
  public get retryTask(): ISessionTask | undefined {
    return this.task;
  }

  /**
   * Asks the provider for authorization. Only the first call has an effect.
   */
  public start(): void {
    if (this.currentState !== 'idle') {
      return;
    }
    this.currentState = 'awaiting-authorization';
    this.options.logger.debug('Obtaining authorization', { url: this.context.request.url });

    let callbackFailure: { error: unknown } | undefined;
    try {
      this.options.authorizationProvider.obtainAuthorization((response, error) => {
        try {
          this.onAuthorizationComplete(response, error);
        } catch (failure) {
          callbackFailure = { error: failure };
          throw failure;
        }
      });
    } catch (error) {
      if (callbackFailure !== undefined && callbackFailure.error === error) {
        // Raised by the caller's completion handler
        throw error;
      }
      if (this.currentState !== 'awaiting-authorization') {
        this.options.logger.error('Authorization provider threw after completing', error, {
          url: this.context.request.url,
        });
        return;
      }
      this.onAuthorizationComplete(undefined, toError(error));
    }
  }

  private onAuthorizationComplete(
    response: AuthorizationResponse | undefined,
    error: Error | undefined,
  ): void {
    if (this.currentState !== 'awaiting-authorization') {
      this.options.logger.warn('Ignoring repeated authorization callback', {
        url: this.context.request.url,
      });
      return;
    }
    this.currentState = 'resolved';

    if (error === undefined && response !== undefined && isSuccessStatus(response.statusCode)) {
      this.resubmit();
      return;
    }

    this.currentOutcome = 'failed';
    const failure =
      error !== undefined
        ? AuthorizationError.providerFailed(error)
        : AuthorizationError.rejected(response?.statusCode);
    this.options.logger.error('Authorization process failed', error, {
      url: this.context.request.url,
      statusCode: response?.statusCode,
    });
    this.context.onFailure(failure);
  }

  private resubmit(): void {
    const { request, source, completion } = this.context;
    const authorization = this.options.authorizationProvider.cachedAuthorizationHeader();
    const retried =
      authorization === undefined
        ? request
        : withHeaders(request, { [AUTHORIZATION_HEADER]: authorization });

    let task: ISessionTask;
    try {
      task = source
        ? this.options.transport.uploadTask(retried, source, completion)
        : this.options.transport.dataTask(retried, completion);
    } catch (error) {
      this.currentOutcome = 'failed';
      const failure = toError(error);
      this.options.logger.error('Resubmitting request failed', failure, { url: retried.url });
      completion(undefined, failure);
      return;
    }

    this.task = task;
    this.currentOutcome = 'retried';
    this.options.logger.debug('Resubmitting request after authorization', {
      url: retried.url,
      taskIdentifier: task.taskIdentifier,
    });
    task.resume();
  }
}

/**
 * Starts reauthorization for challenged requests.
 * @public
 */
export class ChallengeHandler {
  private readonly options: Required<ChallengeHandlerOptions>;

  public constructor(options: ChallengeHandlerOptions) {
    this.options = {
      ...options,
      logger: options.logger ?? createScopedLogger('challenge-handler'),
    };
  }

  /**
   * Runs one reauthorization-and-retry cycle for `context.request`.
   * @returns The challenge, already started
   */
  public handle(context: ChallengeContext): AuthorizationChallenge {
    const challenge = new AuthorizationChallenge(this.options, context);
    challenge.start();
    return challenge;
  }
}
