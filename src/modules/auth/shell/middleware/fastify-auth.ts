/**
 * Fastify Authentication Hooks
 *
 * `makeAuthMiddleware` runs for every request and fills `request.auth`.
 * `requirePublisherHandler` guards the publisher routes.
 */

import { getHttpStatusForAuthError, type AuthError } from '../../core/errors.js';
import { authenticate, type AuthenticateDeps } from '../../core/usecases/authenticate.js';
import { requirePublisher } from '../../core/usecases/require-publisher.js';

import type { AuthContext } from '../../core/types.js';
import type { FastifyReply, FastifyRequest } from 'fastify';

declare module 'fastify' {
  interface FastifyRequest {
    auth: AuthContext;
  }
}

export type MakeAuthMiddlewareDeps = AuthenticateDeps;

export const sendAuthError = (reply: FastifyReply, error: AuthError) =>
  reply.status(getHttpStatusForAuthError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });

export function makeAuthMiddleware(deps: MakeAuthMiddlewareDeps) {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const result = await authenticate(deps, {
      authorizationHeader: request.headers.authorization,
    });

    if (result.isErr()) {
      request.log.info({ errorType: result.error.type }, 'Rejected bearer token');
      await sendAuthError(reply, result.error);
      return;
    }

    request.auth = result.value;
  };
}

export const requirePublisherHandler = async (
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> => {
  const result = requirePublisher(request.auth);
  if (result.isErr()) {
    await sendAuthError(reply, result.error);
  }
};
