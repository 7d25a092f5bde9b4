/**
 * Newsletter Issues REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Requests
// ─────────────────────────────────────────────────────────────────────────────

// Blank fields and the key format are reported by the use case with
// field-specific messages, so only presence is enforced here.
export const PublishIssueBodySchema = Type.Object({
  title: Type.String(),
  htmlContent: Type.String(),
  textContent: Type.String(),
  idempotencyKey: Type.String(),
});

export type PublishIssueBody = Static<typeof PublishIssueBodySchema>;

export const IssueIdParamsSchema = Type.Object({
  issueId: Type.String({ format: 'uuid' }),
});

export type IssueIdParams = Static<typeof IssueIdParamsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Responses
// ─────────────────────────────────────────────────────────────────────────────

const IssueSummarySchema = Type.Object({
  issueId: Type.String(),
  title: Type.String(),
  publishedAt: Type.String(),
  subscribersAtPublish: Type.Integer(),
  deliveredCount: Type.Integer(),
  failedCount: Type.Integer(),
  pendingCount: Type.Integer(),
});

export const IssueListResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(IssueSummarySchema),
});

export const IssueResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Composite([
    IssueSummarySchema,
    Type.Object({
      htmlContent: Type.String(),
      textContent: Type.String(),
    }),
  ]),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
  field: Type.Optional(Type.String()),
});
