/**
 * Authentication Module - Domain Types
 *
 * Publishers are identified by the subject of a verified bearer token. The
 * subject scopes their idempotency keys.
 */

// eslint-disable-next-line @typescript-eslint/naming-convention -- __brand is the standard pattern for branded types in TypeScript
export type UserId = string & { readonly __brand: unique symbol };

export const toUserId = (id: string): UserId => id as UserId;

export interface AuthSession {
  readonly userId: UserId;
  readonly expiresAt: Date;
}

export interface AnonymousSession {
  readonly userId: null;
  readonly isAnonymous: true;
}

/** Attached to every request; subscription routes never look at it */
export type AuthContext = AuthSession | AnonymousSession;

export const isAuthenticated = (ctx: AuthContext): ctx is AuthSession => ctx.userId !== null;

export const ANONYMOUS_SESSION: AnonymousSession = {
  userId: null,
  isAnonymous: true,
} as const;

const BEARER_SCHEME = /^Bearer\s+(\S+)\s*$/;

/**
 * Token from an `Authorization: Bearer <token>` header value.
 * Any other scheme, or a repeated header, counts as no token.
 */
export const parseBearerToken = (header: string | string[] | undefined): string | null => {
  if (typeof header !== 'string') {
    return null;
  }
  return BEARER_SCHEME.exec(header)?.[1] ?? null;
};
