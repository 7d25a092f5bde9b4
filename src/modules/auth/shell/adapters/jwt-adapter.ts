/**
 * JWT Authentication Adapter
 *
 * Verifies bearer tokens signed with an asymmetric key (RS256, ES256, ...)
 * against a PEM-encoded SPKI public key, using `jose`.
 */

import { errors, importSPKI, jwtVerify, type JWTVerifyOptions } from 'jose';
import { ok, err, type Result } from 'neverthrow';

import {
  createAuthProviderError,
  createInvalidTokenError,
  createTokenExpiredError,
  createTokenSignatureError,
  type AuthError,
} from '../../core/errors.js';
import { toUserId, type AuthSession } from '../../core/types.js';

import type { AuthProvider } from '../../core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

type VerificationKey = Awaited<ReturnType<typeof importSPKI>>;

export interface MakeJWTAdapterOptions {
  /** PEM public key, starting with "-----BEGIN PUBLIC KEY-----" */
  publicKeyPEM: string;
  /** @default 'RS256' */
  algorithm?: string;
  issuer?: string;
  audience?: string;
  /** @default 5 */
  clockToleranceSeconds?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const mapVerificationError = (error: unknown): AuthError => {
  if (error instanceof errors.JWTExpired) {
    return createTokenExpiredError();
  }
  if (error instanceof errors.JWSSignatureVerificationFailed) {
    return createTokenSignatureError();
  }
  if (
    error instanceof errors.JWTClaimValidationFailed ||
    error instanceof errors.JWSInvalid ||
    error instanceof errors.JWTInvalid ||
    error instanceof errors.JOSEAlgNotAllowed
  ) {
    return createInvalidTokenError(error.message, error);
  }

  const message = error instanceof Error ? error.message : 'Unknown error during token verification';
  return createAuthProviderError(message, error);
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

export const makeJWTAdapter = (options: MakeJWTAdapterOptions): AuthProvider => {
  const { publicKeyPEM, algorithm = 'RS256', issuer, audience, clockToleranceSeconds = 5 } =
    options;

  // Imported once, on first use
  let keyPromise: Promise<VerificationKey> | undefined;

  const getPublicKey = (): Promise<VerificationKey> => {
    keyPromise ??= importSPKI(publicKeyPEM, algorithm);
    return keyPromise;
  };

  const verifyOptions: JWTVerifyOptions = {
    algorithms: [algorithm],
    clockTolerance: clockToleranceSeconds,
    ...(issuer !== undefined && { issuer }),
    ...(audience !== undefined && { audience }),
  };

  return {
    async verifyToken(token: string): Promise<Result<AuthSession, AuthError>> {
      let publicKey: VerificationKey;
      try {
        publicKey = await getPublicKey();
      } catch (error) {
        keyPromise = undefined;
        const message = error instanceof Error ? error.message : 'Unknown error';
        return err(createAuthProviderError(`Failed to import public key: ${message}`, error));
      }

      try {
        const { payload } = await jwtVerify(token, publicKey, verifyOptions);

        if (typeof payload.sub !== 'string' || payload.sub === '') {
          return err(createInvalidTokenError('Token missing subject (sub) claim'));
        }
        if (typeof payload.exp !== 'number') {
          return err(createInvalidTokenError('Token missing expiration (exp) claim'));
        }

        return ok({
          userId: toUserId(payload.sub),
          expiresAt: new Date(payload.exp * 1000),
        });
      } catch (error) {
        return err(mapVerificationError(error));
      }
    },
  };
};
