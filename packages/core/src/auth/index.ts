export { AuthorizationError, AuthorizationErrorCode } from './errors/authorization-error.js';
export { NoAuthorizationProvider } from './no-authorization-provider.js';
