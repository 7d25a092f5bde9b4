/**
 * Authentication Module Public API
 */

export type { AuthSession, AnonymousSession, AuthContext, UserId } from './core/types.js';
export type { AuthError } from './core/errors.js';
export type { AuthProvider } from './core/ports.js';

export { ANONYMOUS_SESSION, toUserId, isAuthenticated, parseBearerToken } from './core/types.js';
export { createAuthenticationRequiredError, getHttpStatusForAuthError } from './core/errors.js';

export { authenticate, type AuthenticateDeps } from './core/usecases/authenticate.js';
export { requirePublisher } from './core/usecases/require-publisher.js';

export { makeJWTAdapter, type MakeJWTAdapterOptions } from './shell/adapters/jwt-adapter.js';
export {
  makeInMemoryAuthProvider,
  createTestAuthProvider,
  type MakeInMemoryAuthProviderOptions,
} from './shell/adapters/in-memory-adapter.js';

export {
  makeAuthMiddleware,
  requirePublisherHandler,
  sendAuthError,
  type MakeAuthMiddlewareDeps,
} from './shell/middleware/fastify-auth.js';
