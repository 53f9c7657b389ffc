/**
 * Fetch Transport Session
 *
 * Default transport session, built on Node's global fetch.
 * @public
 */

import type {
  CompletionHandler,
  ISessionTask,
  ITransportSession,
  SessionRequest,
  TransportSessionOptions,
  UploadSource,
} from '@session-guard/models';
import { TransportError } from '../errors/transport-error.js';
import { FetchSessionTask, type FetchTaskContext } from './fetch-session-task.js';

export type FetchTransportSessionConfig = Partial<TransportSessionOptions>;

export class FetchTransportSession implements ITransportSession {
  private readonly context: FetchTaskContext;
  private readonly activeTasks = new Set<FetchSessionTask>();
  private isInvalidated = false;

  public constructor(config: FetchTransportSessionConfig = {}) {
    this.context = {
      timeout: config.timeout ?? 30000,
      headers: config.headers ?? {},
      delegate: config.delegate,
      logPrefix: 'fetch-transport',
      onFinish: (task) => {
        this.activeTasks.delete(task);
      },
    };
  }

  public dataTask(request: SessionRequest, completion?: CompletionHandler): ISessionTask {
    return this.createTask(request, undefined, completion);
  }

  public uploadTask(
    request: SessionRequest,
    source: UploadSource,
    completion?: CompletionHandler,
  ): ISessionTask {
    return this.createTask(request, source, completion);
  }

  /**
   * Tasks not yet completed.
   */
  public get pendingTaskCount(): number {
    return this.activeTasks.size;
  }

  /**
   * Cancels every outstanding task and refuses new ones.
   */
  public invalidateAndCancel(): void {
    if (this.isInvalidated) {
      return;
    }
    this.isInvalidated = true;
    for (const task of [...this.activeTasks]) {
      task.cancel();
    }
    this.context.delegate?.didBecomeInvalid?.(undefined);
  }

  private createTask(
    request: SessionRequest,
    source: UploadSource | undefined,
    completion: CompletionHandler | undefined,
  ): FetchSessionTask {
    if (this.isInvalidated) {
      throw TransportError.sessionInvalidated();
    }
    const task = new FetchSessionTask(request, this.context, source, completion);
    this.activeTasks.add(task);
    return task;
  }
}
