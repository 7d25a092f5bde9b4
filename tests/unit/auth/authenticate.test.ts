import { describe, expect, it } from 'vitest';

import {
  ANONYMOUS_SESSION,
  authenticate,
  createTestAuthProvider,
  getHttpStatusForAuthError,
  isAuthenticated,
  parseBearerToken,
} from '@/modules/auth/index.js';

describe('parseBearerToken', () => {
  it('takes the token after the Bearer scheme', () => {
    expect(parseBearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
    expect(parseBearerToken('Bearer   padded  ')).toBe('padded');
  });

  it('ignores other schemes, empty tokens and repeated headers', () => {
    expect(parseBearerToken(undefined)).toBeNull();
    expect(parseBearerToken('Basic dXNlcjpwYXNz')).toBeNull();
    expect(parseBearerToken('Bearer ')).toBeNull();
    expect(parseBearerToken('Bearer two tokens')).toBeNull();
    expect(parseBearerToken(['Bearer a', 'Bearer b'])).toBeNull();
  });
});

describe('authenticate', () => {
  const { provider, tokens, userIds } = createTestAuthProvider();

  it('treats a missing header as anonymous', async () => {
    const result = await authenticate({ authProvider: provider }, { authorizationHeader: undefined });

    expect(result._unsafeUnwrap()).toBe(ANONYMOUS_SESSION);
  });

  it('treats a header without a bearer token as anonymous', async () => {
    const result = await authenticate({ authProvider: provider }, { authorizationHeader: 'Bearer ' });

    expect(isAuthenticated(result._unsafeUnwrap())).toBe(false);
  });

  it('returns the verified session', async () => {
    const result = await authenticate(
      { authProvider: provider },
      { authorizationHeader: `Bearer ${tokens.editor}` }
    );

    const context = result._unsafeUnwrap();
    expect(isAuthenticated(context)).toBe(true);
    if (isAuthenticated(context)) {
      expect(context.userId).toBe(userIds.editor);
    }
  });

  it('passes verification errors through', async () => {
    const result = await authenticate(
      { authProvider: provider },
      { authorizationHeader: 'Bearer bogus' }
    );

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('InvalidTokenError');
    expect(getHttpStatusForAuthError(error)).toBe(401);
  });
});

describe('getHttpStatusForAuthError', () => {
  it('answers 503 when the verifier itself fails', () => {
    expect(getHttpStatusForAuthError({ type: 'AuthProviderError', message: 'no key' })).toBe(503);
    expect(getHttpStatusForAuthError({ type: 'TokenExpiredError', message: 'Token expired' })).toBe(
      401
    );
  });
});
