// Transport domain re-exports - single entry point for transport functionality

// Errors
export * from './errors/transport-error.js';

// Implementations
export * from './implementations/fetch-session-task.js';
export * from './implementations/fetch-transport-session.js';
