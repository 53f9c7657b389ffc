/**
 * Authorized Session
 *
 * Facade over a transport session that decorates every request with
 * authorization and analytics headers and answers authorization challenges
 * with a single reauthorization-and-retry cycle.
 * @public
 */

import type {
  CompletionHandler,
  IAnalyticsMetadataProvider,
  IAuthorizationProvider,
  ISessionDelegate,
  ISessionTask,
  ITransportSession,
  SessionRequest,
  TransportSessionFactory,
  UploadSource,
} from '@session-guard/models';
import type { SessionConfigInput } from '@session-guard/schemas';
import { NoAuthorizationProvider } from '../auth/no-authorization-provider.js';
import { loadSessionConfig } from '../config/session-config.js';
import { createScopedLogger, type ILogger } from '../logger.js';
import { FetchTransportSession } from '../transports/implementations/fetch-transport-session.js';
import { createSessionRequest } from '../utils/request/session-request.js';
import { ChallengeHandler } from './challenge-handler.js';
import { createChallengeAwareCompletionHandler } from './completion-handler.js';
import { ForwardingSessionDelegate } from './forwarding-delegate.js';
import { RequestDecorator } from './request-decorator.js';

/**
 * Configuration for an AuthorizedSession.
 * @public
 */
export interface AuthorizedSessionConfig {
  /** Defaults to NoAuthorizationProvider */
  authorizationProvider?: IAuthorizationProvider;
  analyticsProvider?: IAnalyticsMetadataProvider;
  /** Wrapped in a ForwardingSessionDelegate and handed to the transport */
  delegate?: ISessionDelegate;
  /** Builds the underlying transport; defaults to FetchTransportSession */
  createTransport?: TransportSessionFactory;
  /** Timeout, default headers and log level; environment values fill gaps */
  config?: SessionConfigInput;
  env?: Record<string, string | undefined>;
  generateTrackingId?: () => string;
  logger?: ILogger;
}

const defaultTransportFactory: TransportSessionFactory = (options) =>
  new FetchTransportSession(options);

export class AuthorizedSession {
  public readonly transport: ITransportSession;
  public readonly decorator: RequestDecorator;
  private readonly authorizationProvider: IAuthorizationProvider;
  private readonly challengeHandler: ChallengeHandler;

  public constructor(config: AuthorizedSessionConfig = {}) {
    const sessionConfig = loadSessionConfig(config.config, config.env);
    const logger = config.logger ?? createScopedLogger('authorized-session', sessionConfig.logLevel);

    this.authorizationProvider = config.authorizationProvider ?? new NoAuthorizationProvider();

    const createTransport = config.createTransport ?? defaultTransportFactory;
    this.transport = createTransport({
      timeout: sessionConfig.timeout,
      headers: sessionConfig.headers,
      delegate: config.delegate ? new ForwardingSessionDelegate(config.delegate, logger) : undefined,
    });

    this.decorator = new RequestDecorator({
      authorizationProvider: this.authorizationProvider,
      analyticsProvider: config.analyticsProvider,
      generateTrackingId: config.generateTrackingId,
    });

    this.challengeHandler = new ChallengeHandler({
      transport: this.transport,
      authorizationProvider: this.authorizationProvider,
      logger,
    });
  }

  /**
   * Creates a data task for a URL or request. With a completion handler,
   * an authorization challenge is answered before the handler is called.
   */
  public dataTask(input: string | URL | SessionRequest, completion?: CompletionHandler): ISessionTask {
    const request = typeof input === 'string' || input instanceof URL ? createSessionRequest(input) : input;
    const decorated = this.decorator.decorate(request);

    if (completion === undefined) {
      return this.transport.dataTask(decorated);
    }
    return this.transport.dataTask(decorated, this.wrapCompletion(request, undefined, completion));
  }

  /**
   * Creates an upload task sending `data` as the body.
   */
  public uploadTask(
    request: SessionRequest,
    data: Uint8Array | undefined,
    completion?: CompletionHandler,
  ): ISessionTask {
    return this.createUploadTask(request, { type: 'data', data }, completion);
  }

  /**
   * Creates an upload task sending the contents of the file at `path`.
   */
  public uploadTaskFromFile(
    request: SessionRequest,
    path: string,
    completion?: CompletionHandler,
  ): ISessionTask {
    return this.createUploadTask(request, { type: 'file', path }, completion);
  }

  private createUploadTask(
    request: SessionRequest,
    source: UploadSource,
    completion: CompletionHandler | undefined,
  ): ISessionTask {
    const decorated = this.decorator.decorate(request);

    if (completion === undefined) {
      return this.transport.uploadTask(decorated, source);
    }
    return this.transport.uploadTask(decorated, source, this.wrapCompletion(request, source, completion));
  }

  private wrapCompletion(
    request: SessionRequest,
    source: UploadSource | undefined,
    completion: CompletionHandler,
  ): CompletionHandler {
    return createChallengeAwareCompletionHandler({
      request,
      source,
      completion,
      authorizationProvider: this.authorizationProvider,
      challengeHandler: this.challengeHandler,
    });
  }
}
