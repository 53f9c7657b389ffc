import { v4 as uuidv4 } from 'uuid';

/**
 * Generates a tracking identifier for one outgoing request.
 *
 * Simple wrapper around uuid v4 generation; every call yields a new value.
 * @returns UUID v4 string
 * @public
 */
export function generateTrackingId(): string {
  return uuidv4();
}
