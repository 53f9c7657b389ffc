/**
 * Request body helpers for the fetch transport
 *
 * @internal
 */

import { readFile } from 'fs/promises';
import type { RequestBody, UploadSource } from '@session-guard/models';
import { TransportError } from '../../errors/transport-error.js';

/**
 * Loads the bytes to send. An upload source takes precedence over the
 * request's own body.
 * @throws \{TransportError\} When a file body cannot be read
 * @internal
 */
export async function loadRequestBody(
  body: RequestBody | UploadSource | undefined,
): Promise<Uint8Array | undefined> {
  if (body === undefined) {
    return undefined;
  }
  if (body.type === 'data') {
    return body.data;
  }

  try {
    return await readFile(body.path);
  } catch (error) {
    throw TransportError.invalidRequest(
      `cannot read upload file ${body.path}`,
      error instanceof Error ? error : undefined,
    );
  }
}
