/**
 * Authentication Module - Ports
 */

import type { AuthError } from './errors.js';
import type { AuthSession } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Verifies a bearer token and returns the session it carries.
 */
export interface AuthProvider {
  verifyToken(token: string): Promise<Result<AuthSession, AuthError>>;
}
