export { generateTrackingId } from './generateTrackingId.js';
export { getHeader, mergeHeaders } from './headers.js';
export { createSessionRequest, withHeaders, type SessionRequestInit } from './session-request.js';
