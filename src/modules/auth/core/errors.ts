/**
 * Authentication Module - Domain Errors
 */

interface AuthFailure<T extends string> {
  readonly type: T;
  readonly message: string;
  readonly cause?: unknown;
}

export type InvalidTokenError = AuthFailure<'InvalidTokenError'>;
export type TokenExpiredError = AuthFailure<'TokenExpiredError'>;
export type TokenSignatureError = AuthFailure<'TokenSignatureError'>;
/** The request reached a publisher-only route without a session */
export type AuthenticationRequiredError = AuthFailure<'AuthenticationRequiredError'>;
/** The verification key could not be loaded, or the verifier failed unexpectedly */
export type AuthProviderError = AuthFailure<'AuthProviderError'>;

export type AuthError =
  | InvalidTokenError
  | TokenExpiredError
  | TokenSignatureError
  | AuthenticationRequiredError
  | AuthProviderError;

export const createInvalidTokenError = (message: string, cause?: unknown): InvalidTokenError => ({
  type: 'InvalidTokenError',
  message,
  cause,
});

export const createTokenExpiredError = (): TokenExpiredError => ({
  type: 'TokenExpiredError',
  message: 'Token expired',
});

export const createTokenSignatureError = (): TokenSignatureError => ({
  type: 'TokenSignatureError',
  message: 'Token signature verification failed',
});

export const createAuthenticationRequiredError = (): AuthenticationRequiredError => ({
  type: 'AuthenticationRequiredError',
  message: 'Authentication required',
});

export const createAuthProviderError = (message: string, cause?: unknown): AuthProviderError => ({
  type: 'AuthProviderError',
  message,
  cause,
});

/**
 * A broken verifier is the server's problem, every other failure is the caller's.
 */
export const getHttpStatusForAuthError = (error: AuthError): 401 | 503 =>
  error.type === 'AuthProviderError' ? 503 : 401;
