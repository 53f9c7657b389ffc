import type { HttpHeaders, SessionRequest, UploadSource } from './request.js';
import type { CompletionHandler } from './response.js';
import type { ISessionDelegate } from './delegate.js';

export type SessionTaskState = 'suspended' | 'running' | 'canceling' | 'completed';

/**
 * A unit of work created by a transport session. Tasks start suspended and
 * send nothing until resumed.
 */
export interface ISessionTask {
  readonly taskIdentifier: number;
  readonly request: SessionRequest;
  readonly state: SessionTaskState;
  resume(): void;
  cancel(): void;
}

/**
 * The networking engine that actually sends requests.
 */
export interface ITransportSession {
  dataTask(request: SessionRequest, completion?: CompletionHandler): ISessionTask;
  uploadTask(
    request: SessionRequest,
    source: UploadSource,
    completion?: CompletionHandler,
  ): ISessionTask;
}

/**
 * Options handed to a transport factory when a session is built.
 */
export interface TransportSessionOptions {
  /** Per-request timeout in milliseconds */
  timeout: number;
  /** Headers applied to every request unless the request sets them itself */
  headers: HttpHeaders;
  delegate?: ISessionDelegate;
}

export type TransportSessionFactory = (options: TransportSessionOptions) => ITransportSession;
