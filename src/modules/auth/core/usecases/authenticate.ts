/**
 * Authenticate Use Case
 *
 * Turns the Authorization header into an auth context. No bearer token means
 * an anonymous session; a bearer token that fails verification is an error.
 */

import { ok, type Result } from 'neverthrow';

import { ANONYMOUS_SESSION, parseBearerToken, type AuthContext } from '../types.js';

import type { AuthError } from '../errors.js';
import type { AuthProvider } from '../ports.js';

export interface AuthenticateDeps {
  authProvider: AuthProvider;
}

export interface AuthenticateInput {
  authorizationHeader: string | string[] | undefined;
}

export async function authenticate(
  deps: AuthenticateDeps,
  input: AuthenticateInput
): Promise<Result<AuthContext, AuthError>> {
  const token = parseBearerToken(input.authorizationHeader);
  if (token === null) {
    return ok(ANONYMOUS_SESSION);
  }

  const sessionResult = await deps.authProvider.verifyToken(token);
  return sessionResult.map((session): AuthContext => session);
}
