/**
 * Subscriptions REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Requests
// ─────────────────────────────────────────────────────────────────────────────

// Lengths and characters are checked by the domain parsers
export const SubscribeBodySchema = Type.Object({
  name: Type.String(),
  email: Type.String(),
});

export type SubscribeBody = Static<typeof SubscribeBodySchema>;

export const SubscriptionTokenQuerySchema = Type.Object({
  subscription_token: Type.String(),
});

export type SubscriptionTokenQuery = Static<typeof SubscriptionTokenQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Responses
// ─────────────────────────────────────────────────────────────────────────────

export const SubscribeResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    message: Type.String(),
  }),
});

export const ConfirmResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    name: Type.String(),
    email: Type.String(),
    newlyConfirmed: Type.Boolean(),
  }),
});

export const UnsubscribeResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    name: Type.String(),
    email: Type.String(),
  }),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
  field: Type.Optional(Type.String()),
});
