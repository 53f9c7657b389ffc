/**
 * Fetch Session Task
 *
 * One request sent through Node's global fetch. Tasks start suspended and
 * report either through their completion handler or, when they have none,
 * through the session delegate.
 * @public
 */

import type {
  CompletionHandler,
  HttpHeaders,
  ISessionDelegate,
  ISessionTask,
  SessionRequest,
  SessionResponse,
  SessionTaskState,
  UploadSource,
} from '@session-guard/models';
import { TransportError } from '../errors/transport-error.js';
import { logError, logEvent } from '../../logger.js';
import { mergeHeaders } from '../../utils/request/headers.js';
import { loadRequestBody } from './utils/request-body.js';
import { toSessionResponse } from './utils/response-conversion.js';

/**
 * Settings a task inherits from its session.
 * @public
 */
export interface FetchTaskContext {
  timeout: number;
  headers: HttpHeaders;
  delegate?: ISessionDelegate;
  logPrefix: string;
  onFinish: (task: FetchSessionTask) => void;
}

type AbortReason = 'timeout' | 'cancelled';

let nextTaskIdentifier = 1;

export class FetchSessionTask implements ISessionTask {
  public readonly taskIdentifier = nextTaskIdentifier++;
  private currentState: SessionTaskState = 'suspended';
  private readonly controller = new AbortController();
  private abortReason?: AbortReason;

  public constructor(
    public readonly request: SessionRequest,
    private readonly context: FetchTaskContext,
    private readonly source?: UploadSource,
    private readonly completion?: CompletionHandler,
  ) {}

  public get state(): SessionTaskState {
    return this.currentState;
  }

  /**
   * Sends the request. Only the first call on a suspended task has an effect.
   */
  public resume(): void {
    if (this.currentState !== 'suspended') {
      return;
    }
    this.currentState = 'running';
    this.execute().catch((error: unknown) => {
      if (this.currentState === 'completed') {
        // Thrown by a completion handler or delegate after the task finished
        this.logCallbackError(error);
        return;
      }
      try {
        this.finish(undefined, this.toTransportError(error));
      } catch (callbackError) {
        this.logCallbackError(callbackError);
      }
    });
  }

  public cancel(): void {
    if (this.currentState === 'completed' || this.currentState === 'canceling') {
      return;
    }
    const wasSuspended = this.currentState === 'suspended';
    this.currentState = 'canceling';
    this.abortReason = 'cancelled';
    this.controller.abort();
    if (wasSuspended) {
      this.finish(undefined, TransportError.requestCancelled());
    }
  }

  private async execute(): Promise<void> {
    const timer = setTimeout(() => {
      this.abortReason = 'timeout';
      this.controller.abort();
    }, this.context.timeout);

    try {
      const body = await loadRequestBody(this.source ?? this.request.body);
      const response = await fetch(this.request.url, {
        method: this.request.method,
        headers: mergeHeaders(this.context.headers, this.request.headers),
        body,
        signal: this.controller.signal,
      });

      if (body !== undefined && this.source !== undefined) {
        this.notifyDelegate((delegate) =>
          delegate.didSendBodyData?.(this, body.byteLength, body.byteLength, body.byteLength),
        );
      }

      const head = toSessionResponse(response, this.request.url);
      this.notifyDelegate((delegate) => delegate.didReceiveResponse?.(this, head));

      const data = new Uint8Array(await response.arrayBuffer());
      if (data.byteLength > 0) {
        this.notifyDelegate((delegate) => delegate.didReceiveData?.(this, data));
      }

      logEvent('debug', `${this.context.logPrefix}:response`, {
        taskIdentifier: this.taskIdentifier,
        method: this.request.method,
        status: head.status,
      });
      this.finish({ ...head, body: data }, undefined);
    } finally {
      clearTimeout(timer);
    }
  }

  private toTransportError(error: unknown): TransportError {
    if (error instanceof TransportError) {
      return error;
    }
    const cause = error instanceof Error ? error : undefined;
    if (this.abortReason === 'timeout') {
      return TransportError.requestTimeout(this.context.timeout, cause);
    }
    if (this.abortReason === 'cancelled') {
      return TransportError.requestCancelled(cause);
    }
    return TransportError.connectionFailed(
      cause ? cause.message : `HTTP request failed: ${String(error)}`,
      cause,
    );
  }

  /**
   * Delegate callbacks only fire for tasks without a completion handler.
   */
  private notifyDelegate(notify: (delegate: ISessionDelegate) => void): void {
    if (this.completion === undefined && this.context.delegate !== undefined) {
      try {
        notify(this.context.delegate);
      } catch (error) {
        this.logCallbackError(error);
      }
    }
  }

  private logCallbackError(error: unknown): void {
    logError(`${this.context.logPrefix}:callback`, error, {
      taskIdentifier: this.taskIdentifier,
    });
  }

  private finish(response: SessionResponse | undefined, error: Error | undefined): void {
    if (this.currentState === 'completed') {
      return;
    }
    this.currentState = 'completed';
    this.context.onFinish(this);

    if (error !== undefined) {
      logEvent('warn', `${this.context.logPrefix}:task-failed`, {
        taskIdentifier: this.taskIdentifier,
        error: error.message,
      });
    }

    if (this.completion !== undefined) {
      this.completion(response, error);
      return;
    }
    this.context.delegate?.didCompleteWithError?.(this, error);
  }
}
