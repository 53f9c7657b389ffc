// Session types
export type {
  HttpMethod,
  HttpHeaders,
  RequestBody,
  UploadSource,
  SessionRequest,
  HttpSessionResponse,
  OpaqueSessionResponse,
  SessionResponse,
  CompletionHandler,
  SessionTaskState,
  ISessionTask,
  ITransportSession,
  TransportSessionOptions,
  TransportSessionFactory,
  ISessionDelegate,
  AuthorizationResponse,
  AuthorizationCompletionHandler,
  IAuthorizationProvider,
  IAnalyticsMetadataProvider,
} from './session/index.js';
