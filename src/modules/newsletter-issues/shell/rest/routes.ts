/**
 * Newsletter Issues REST Routes
 *
 * Publishing and the delivery overview. Every endpoint requires an
 * authenticated editor.
 */

import { renderAcceptedResponse } from './responses.js';
import {
  ErrorResponseSchema,
  IssueIdParamsSchema,
  IssueListResponseSchema,
  IssueResponseSchema,
  PublishIssueBodySchema,
  type IssueIdParams,
  type PublishIssueBody,
} from './schemas.js';
import { requirePublisher, requirePublisherHandler, sendAuthError } from '../../../auth/index.js';
import { getHttpStatusForError, type PublishIssueError } from '../../core/errors.js';
import { pendingDeliveries, type NewsletterIssue } from '../../core/types.js';
import { getIssue } from '../../core/usecases/get-issue.js';
import { listIssues } from '../../core/usecases/list-issues.js';
import { publishIssue } from '../../core/usecases/publish-issue.js';

import type { IdempotencyRepository, SavedResponse } from '../../../idempotency/index.js';
import type { IssuesRepository, PublishScope } from '../../core/ports.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeIssueRoutesDeps {
  idempotencyRepo: IdempotencyRepository<PublishScope>;
  issuesRepo: IssuesRepository;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function formatSummary(issue: NewsletterIssue) {
  return {
    issueId: issue.issueId,
    title: issue.title,
    publishedAt: issue.publishedAt.toISOString(),
    subscribersAtPublish: issue.subscribersAtPublish,
    deliveredCount: issue.deliveredCount,
    failedCount: issue.failedCount,
    pendingCount: pendingDeliveries(issue),
  };
}

function sendError(reply: FastifyReply, error: PublishIssueError) {
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
    ...(error.type === 'IssueValidationError' && { field: error.field }),
  });
}

function sendSaved(reply: FastifyReply, response: SavedResponse) {
  reply.status(response.statusCode);
  for (const header of response.headers) {
    reply.header(header.name, header.value);
  }
  return reply.send(response.body);
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeIssueRoutes = (deps: MakeIssueRoutesDeps): FastifyPluginAsync => {
  const { idempotencyRepo, issuesRepo, logger } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/newsletters/issues - Publish an issue
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: PublishIssueBody }>(
      '/api/v1/newsletters/issues',
      {
        preHandler: requirePublisherHandler,
        schema: {
          body: PublishIssueBodySchema,
          response: {
            400: ErrorResponseSchema,
            401: ErrorResponseSchema,
            409: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const publisher = requirePublisher(request.auth);
        if (publisher.isErr()) {
          return sendAuthError(reply, publisher.error);
        }

        const result = await publishIssue(
          { idempotencyRepo, logger },
          {
            userId: publisher.value,
            title: request.body.title,
            htmlContent: request.body.htmlContent,
            textContent: request.body.textContent,
            idempotencyKey: request.body.idempotencyKey,
            renderResponse: renderAcceptedResponse,
          }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return sendSaved(reply, result.value.response);
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/newsletters/issues - Delivery overview
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/newsletters/issues',
      {
        preHandler: requirePublisherHandler,
        schema: {
          response: {
            200: IssueListResponseSchema,
            401: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const publisher = requirePublisher(request.auth);
        if (publisher.isErr()) {
          return sendAuthError(reply, publisher.error);
        }

        const result = await listIssues({ issuesRepo });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value.map(formatSummary) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/newsletters/issues/:issueId - One issue
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: IssueIdParams }>(
      '/api/v1/newsletters/issues/:issueId',
      {
        preHandler: requirePublisherHandler,
        schema: {
          params: IssueIdParamsSchema,
          response: {
            200: IssueResponseSchema,
            400: ErrorResponseSchema,
            401: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const publisher = requirePublisher(request.auth);
        if (publisher.isErr()) {
          return sendAuthError(reply, publisher.error);
        }

        const result = await getIssue({ issuesRepo }, request.params.issueId);
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        const issue = result.value;
        return reply.status(200).send({
          ok: true,
          data: {
            ...formatSummary(issue),
            htmlContent: issue.htmlContent,
            textContent: issue.textContent,
          },
        });
      }
    );
  };
};
