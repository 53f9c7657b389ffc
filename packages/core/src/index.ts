export type * from '@session-guard/models';

export * from './session/index.js';
export * from './transports/index.js';
export * from './auth/index.js';
export * from './analytics/index.js';
export * from './config/index.js';
export * from './utils/request/index.js';

// Logging with redaction
export * from './logging/index.js';
