import type {
  IAnalyticsMetadataProvider,
  IAuthorizationProvider,
  SessionRequest,
} from '@session-guard/models';
import { generateTrackingId } from '../utils/request/generateTrackingId.js';
import { withHeaders } from '../utils/request/session-request.js';
import {
  ANALYTICS_METADATA_HEADER,
  AUTHORIZATION_HEADER,
  TRACKING_ID_HEADER,
} from './constants.js';

export interface RequestDecoratorOptions {
  authorizationProvider: Pick<IAuthorizationProvider, 'cachedAuthorizationHeader'>;
  analyticsProvider?: IAnalyticsMetadataProvider;
  /** Defaults to a UUID v4 per call */
  generateTrackingId?: () => string;
}

/**
 * Annotates outgoing requests with authorization and analytics headers.
 * @public
 */
export class RequestDecorator {
  private readonly nextTrackingId: () => string;

  public constructor(private readonly options: RequestDecoratorOptions) {
    this.nextTrackingId = options.generateTrackingId ?? generateTrackingId;
  }

  /**
   * Produces a decorated copy of `request`:
   * - `Authorization` when the provider has a cached header
   * - `x-wl-analytics-tracking-id`, always, freshly generated
   * - `x-mfp-analytics-metadata` when analytics metadata is available
   *
   * The original request is never modified.
   */
  public decorate(request: SessionRequest): SessionRequest {
    const additions: Record<string, string> = {};

    const authorization = this.options.authorizationProvider.cachedAuthorizationHeader();
    if (authorization !== undefined) {
      additions[AUTHORIZATION_HEADER] = authorization;
    }

    additions[TRACKING_ID_HEADER] = this.nextTrackingId();

    const metadata = this.options.analyticsProvider?.currentAnalyticsMetadata();
    if (metadata !== undefined) {
      additions[ANALYTICS_METADATA_HEADER] = metadata;
    }

    return withHeaders(request, additions);
  }
}
