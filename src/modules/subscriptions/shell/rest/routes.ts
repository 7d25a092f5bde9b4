/**
 * Subscriptions REST Routes
 *
 * Public endpoints: subscribing, confirming through the emailed link, and
 * unsubscribing with the same token.
 */

import {
  ConfirmResponseSchema,
  ErrorResponseSchema,
  SubscribeBodySchema,
  SubscribeResponseSchema,
  SubscriptionTokenQuerySchema,
  UnsubscribeResponseSchema,
  type SubscribeBody,
  type SubscriptionTokenQuery,
} from './schemas.js';
import { getHttpStatusForError, type SubscriptionError } from '../../core/errors.js';
import { confirmSubscription } from '../../core/usecases/confirm-subscription.js';
import { subscribe } from '../../core/usecases/subscribe.js';
import { unsubscribe } from '../../core/usecases/unsubscribe.js';

import type {
  ConfirmationEmailSender,
  SubscriptionsRepository,
  TokenGenerator,
} from '../../core/ports.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

export interface MakeSubscriptionRoutesDeps {
  subscriptionsRepo: SubscriptionsRepository;
  tokenGenerator: TokenGenerator;
  emailSender: ConfirmationEmailSender;
  baseUrl: string;
}

export const SUBSCRIBE_SUCCESS_MESSAGE = 'Check your inbox to confirm your subscription.';

function sendError(reply: FastifyReply, error: SubscriptionError) {
  if (getHttpStatusForError(error) >= 500) {
    reply.log.error({ err: error }, 'Subscription request failed');
  }
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
    ...(error.type === 'InvalidSubscriberError' && { field: error.field }),
  });
}

export const makeSubscriptionRoutes = (deps: MakeSubscriptionRoutesDeps): FastifyPluginAsync => {
  const { subscriptionsRepo, tokenGenerator, emailSender, baseUrl } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // POST /subscriptions
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: SubscribeBody }>(
      '/subscriptions',
      {
        schema: {
          body: SubscribeBodySchema,
          response: {
            200: SubscribeResponseSchema,
            400: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await subscribe(
          { subscriptionsRepo, tokenGenerator, emailSender, baseUrl },
          request.body
        );
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { message: SUBSCRIBE_SUCCESS_MESSAGE } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /subscriptions/confirm?subscription_token=...
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: SubscriptionTokenQuery }>(
      '/subscriptions/confirm',
      {
        schema: {
          querystring: SubscriptionTokenQuerySchema,
          response: {
            200: ConfirmResponseSchema,
            400: ErrorResponseSchema,
            401: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await confirmSubscription(
          { subscriptionsRepo },
          request.query.subscription_token
        );
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        const { name, email, newlyConfirmed } = result.value;
        return reply.status(200).send({ ok: true, data: { name, email, newlyConfirmed } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /subscriptions/unsubscribe?subscription_token=...
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: SubscriptionTokenQuery }>(
      '/subscriptions/unsubscribe',
      {
        schema: {
          querystring: SubscriptionTokenQuerySchema,
          response: {
            200: UnsubscribeResponseSchema,
            400: ErrorResponseSchema,
            401: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await unsubscribe({ subscriptionsRepo }, request.query.subscription_token);
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );
  };
};
