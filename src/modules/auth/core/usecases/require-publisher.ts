/**
 * Publishing and the delivery overview belong to signed-in publishers only.
 */

import { ok, err, type Result } from 'neverthrow';

import { createAuthenticationRequiredError, type AuthenticationRequiredError } from '../errors.js';
import { isAuthenticated, type AuthContext, type UserId } from '../types.js';

export function requirePublisher(
  context: AuthContext
): Result<UserId, AuthenticationRequiredError> {
  return isAuthenticated(context) ? ok(context.userId) : err(createAuthenticationRequiredError());
}
