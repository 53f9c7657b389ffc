import type { ISessionDelegate, ISessionTask, SessionResponse } from '@session-guard/models';
import { createScopedLogger, type ILogger } from '../logger.js';

/**
 * Session delegate that wraps a caller-supplied delegate.
 *
 * Implements the whole delegate capability set and forwards every call the
 * wrapped delegate implements. Failed tasks are logged before forwarding.
 * @public
 */
export class ForwardingSessionDelegate implements ISessionDelegate {
  private readonly logger: ILogger;

  public constructor(
    public readonly parent: ISessionDelegate,
    logger?: ILogger,
  ) {
    this.logger = logger ?? createScopedLogger('session-delegate');
  }

  public didReceiveResponse(task: ISessionTask, response: SessionResponse): void {
    this.parent.didReceiveResponse?.(task, response);
  }

  public didReceiveData(task: ISessionTask, data: Uint8Array): void {
    this.parent.didReceiveData?.(task, data);
  }

  public didSendBodyData(
    task: ISessionTask,
    bytesSent: number,
    totalBytesSent: number,
    totalBytesExpectedToSend: number,
  ): void {
    this.parent.didSendBodyData?.(task, bytesSent, totalBytesSent, totalBytesExpectedToSend);
  }

  public didCompleteWithError(task: ISessionTask, error: Error | undefined): void {
    if (error !== undefined) {
      this.logger.error('Task failed', error, {
        taskIdentifier: task.taskIdentifier,
        url: task.request.url,
      });
    }
    this.parent.didCompleteWithError?.(task, error);
  }

  public didBecomeInvalid(error: Error | undefined): void {
    this.parent.didBecomeInvalid?.(error);
  }
}
