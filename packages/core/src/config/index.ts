export { loadSessionConfig, SessionConfigError } from './session-config.js';
