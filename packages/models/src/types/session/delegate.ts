import type { SessionResponse } from './response.js';
import type { ISessionTask } from './transport.js';

/**
 * Delegate capability set of a transport session. Every member is optional;
 * transports call whichever ones the delegate implements.
 */
export interface ISessionDelegate {
  /** The response head arrived (status line and headers) */
  didReceiveResponse?(task: ISessionTask, response: SessionResponse): void;

  /** A chunk of the response body arrived */
  didReceiveData?(task: ISessionTask, data: Uint8Array): void;

  /** Upload progress */
  didSendBodyData?(
    task: ISessionTask,
    bytesSent: number,
    totalBytesSent: number,
    totalBytesExpectedToSend: number,
  ): void;

  /** The task finished; `error` is undefined on success */
  didCompleteWithError?(task: ISessionTask, error: Error | undefined): void;

  /** The session was invalidated and will create no more tasks */
  didBecomeInvalid?(error: Error | undefined): void;
}
