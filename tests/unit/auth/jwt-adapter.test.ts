/**
 * Tests for the JWT authentication adapter, against keys generated with jose.
 */

import { SignJWT, exportSPKI, generateKeyPair, type JWTPayload } from 'jose';
import { beforeAll, describe, expect, it } from 'vitest';

import { makeJWTAdapter } from '@/modules/auth/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Test Helpers
// ─────────────────────────────────────────────────────────────────────────────

type KeyPair = Awaited<ReturnType<typeof generateKeyPair>>;

let signingKeys: KeyPair;
let otherKeys: KeyPair;
let publicKeyPEM: string;

const nowSeconds = (): number => Math.floor(Date.now() / 1000);

const sign = (payload: JWTPayload, keys: KeyPair = signingKeys): Promise<string> =>
  new SignJWT(payload).setProtectedHeader({ alg: 'RS256' }).sign(keys.privateKey);

beforeAll(async () => {
  signingKeys = await generateKeyPair('RS256');
  otherKeys = await generateKeyPair('RS256');
  publicKeyPEM = await exportSPKI(signingKeys.publicKey);
});

// ─────────────────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────────────────

describe('makeJWTAdapter', () => {
  describe('successful verification', () => {
    it('returns a session for the sub claim, expiring at exp', async () => {
      const exp = nowSeconds() + 3600;
      const adapter = makeJWTAdapter({ publicKeyPEM });

      const result = await adapter.verifyToken(await sign({ sub: 'user_123', exp }));

      expect(result._unsafeUnwrap()).toEqual({
        userId: 'user_123',
        expiresAt: new Date(exp * 1000),
      });
    });

    it('accepts matching issuer and audience', async () => {
      const adapter = makeJWTAdapter({
        publicKeyPEM,
        issuer: 'https://auth.newsletter.test',
        audience: 'newsletter-api',
      });
      const token = await sign({
        sub: 'user_123',
        exp: nowSeconds() + 60,
        iss: 'https://auth.newsletter.test',
        aud: 'newsletter-api',
      });

      const result = await adapter.verifyToken(token);

      expect(result.isOk()).toBe(true);
    });
  });

  describe('rejected tokens', () => {
    it('maps an expired token to TokenExpiredError', async () => {
      const adapter = makeJWTAdapter({ publicKeyPEM });

      const result = await adapter.verifyToken(
        await sign({ sub: 'user_123', exp: nowSeconds() - 3600 })
      );

      expect(result._unsafeUnwrapErr().type).toBe('TokenExpiredError');
    });

    it('maps a token signed with another key to TokenSignatureError', async () => {
      const adapter = makeJWTAdapter({ publicKeyPEM });

      const result = await adapter.verifyToken(
        await sign({ sub: 'user_123', exp: nowSeconds() + 60 }, otherKeys)
      );

      expect(result._unsafeUnwrapErr().type).toBe('TokenSignatureError');
    });

    it('requires a subject', async () => {
      const adapter = makeJWTAdapter({ publicKeyPEM });

      const result = await adapter.verifyToken(await sign({ exp: nowSeconds() + 60 }));

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'InvalidTokenError',
        message: 'Token missing subject (sub) claim',
      });
    });

    it('requires an expiration', async () => {
      const adapter = makeJWTAdapter({ publicKeyPEM });

      const result = await adapter.verifyToken(await sign({ sub: 'user_123' }));

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'InvalidTokenError',
        message: 'Token missing expiration (exp) claim',
      });
    });

    it('maps an issuer mismatch to InvalidTokenError', async () => {
      const adapter = makeJWTAdapter({ publicKeyPEM, issuer: 'https://auth.newsletter.test' });

      const result = await adapter.verifyToken(
        await sign({ sub: 'user_123', exp: nowSeconds() + 60, iss: 'https://elsewhere.test' })
      );

      expect(result._unsafeUnwrapErr().type).toBe('InvalidTokenError');
    });

    it('maps a malformed token to InvalidTokenError', async () => {
      const adapter = makeJWTAdapter({ publicKeyPEM });

      const result = await adapter.verifyToken('not-a-jwt');

      expect(result._unsafeUnwrapErr().type).toBe('InvalidTokenError');
    });
  });

  describe('key import', () => {
    it('reports an unusable public key as AuthProviderError', async () => {
      const adapter = makeJWTAdapter({
        publicKeyPEM: '-----BEGIN PUBLIC KEY-----\ninvalid\n-----END PUBLIC KEY-----',
      });

      const result = await adapter.verifyToken('any-token');

      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe('AuthProviderError');
      expect(error.message.startsWith('Failed to import public key: ')).toBe(true);
    });
  });
});
