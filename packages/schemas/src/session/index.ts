export * from './LogLevelSchema.js';
export * from './SessionConfigSchema.js';
