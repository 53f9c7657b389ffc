export type {
  HttpMethod,
  HttpHeaders,
  RequestBody,
  UploadSource,
  SessionRequest,
} from './request.js';
export type {
  HttpSessionResponse,
  OpaqueSessionResponse,
  SessionResponse,
  CompletionHandler,
} from './response.js';
export type {
  SessionTaskState,
  ISessionTask,
  ITransportSession,
  TransportSessionOptions,
  TransportSessionFactory,
} from './transport.js';
export type { ISessionDelegate } from './delegate.js';
export type {
  AuthorizationResponse,
  AuthorizationCompletionHandler,
  IAuthorizationProvider,
  IAnalyticsMetadataProvider,
} from './providers.js';
