/**
 * In-Memory Authentication Adapter
 *
 * AuthProvider backed by a fixed token table. Used by tests and local runs.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createInvalidTokenError,
  createTokenExpiredError,
  type AuthError,
} from '../../core/errors.js';
import { toUserId, type AuthSession } from '../../core/types.js';

import type { AuthProvider } from '../../core/ports.js';

export interface MakeInMemoryAuthProviderOptions {
  /** Token -> user ID */
  validTokens?: Map<string, string>;
  expiredTokens?: Set<string>;
  /** @default 1 hour */
  tokenTTLMs?: number;
}

const DEFAULT_TOKEN_TTL_MS = 60 * 60 * 1000;

export const makeInMemoryAuthProvider = (
  options: MakeInMemoryAuthProviderOptions = {}
): AuthProvider => {
  const tokens = options.validTokens ?? new Map<string, string>();
  const expiredTokens = options.expiredTokens ?? new Set<string>();
  const tokenTTLMs = options.tokenTTLMs ?? DEFAULT_TOKEN_TTL_MS;

  return {
    verifyToken(token: string): Promise<Result<AuthSession, AuthError>> {
      if (expiredTokens.has(token)) {
        return Promise.resolve(err(createTokenExpiredError()));
      }

      const userId = tokens.get(token);
      if (userId === undefined) {
        return Promise.resolve(err(createInvalidTokenError('Invalid or unknown token')));
      }

      return Promise.resolve(
        ok({ userId: toUserId(userId), expiresAt: new Date(Date.now() + tokenTTLMs) })
      );
    },
  };
};

/**
 * Provider with two publishers and one expired token.
 */
export const createTestAuthProvider = () => {
  const userIds = {
    editor: 'user_editor',
    otherEditor: 'user_other_editor',
  };

  const tokens = {
    editor: `test-token-${userIds.editor}`,
    otherEditor: `test-token-${userIds.otherEditor}`,
    expired: 'expired-token',
  };

  const provider = makeInMemoryAuthProvider({
    validTokens: new Map([
      [tokens.editor, userIds.editor],
      [tokens.otherEditor, userIds.otherEditor],
      [tokens.expired, userIds.editor],
    ]),
    expiredTokens: new Set([tokens.expired]),
  });

  return { provider, tokens, userIds };
};
