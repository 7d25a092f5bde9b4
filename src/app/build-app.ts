/**
 * Fastify application factory
 *
 * The composition root of the HTTP API: wires repositories into the module
 * routes and registers the cross-cutting plugins and handlers.
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors } from '../infra/plugins/cors.js';
import { registerSecurityHeaders } from '../infra/plugins/security-headers.js';
import { ANONYMOUS_SESSION, makeAuthMiddleware, type AuthProvider } from '../modules/auth/index.js';
import { makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';
import { makeIdempotencyRepo, type IdempotencyRepository } from '../modules/idempotency/index.js';
import {
  makeIssueRoutes,
  makeIssuesRepo,
  makePublishScope,
  type IssuesRepository,
  type PublishScope,
} from '../modules/newsletter-issues/index.js';
import {
  makeSubscriptionRoutes,
  makeSubscriptionsRepo,
  makeTokenGenerator,
  type ConfirmationEmailSender,
  type SubscriptionsRepository,
  type TokenGenerator,
} from '../modules/subscriptions/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { NewsletterDbClient } from '../infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface AppRepositories {
  subscriptionsRepo: SubscriptionsRepository;
  idempotencyRepo: IdempotencyRepository<PublishScope>;
  issuesRepo: IssuesRepository;
}

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  /** Needed unless every repository is injected */
  db?: NewsletterDbClient;
  emailSender: ConfirmationEmailSender;
  /** Without one, every request is anonymous and protected routes answer 401 */
  authProvider?: AuthProvider;
  tokenGenerator?: TokenGenerator;
  healthCheckers?: HealthChecker[];
  repositories?: Partial<AppRepositories>;
}

export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
  version?: string | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const resolveRepositories = (deps: AppDeps): AppRepositories => {
  const { db, logger, repositories = {} } = deps;

  const requireDb = (name: keyof AppRepositories): NewsletterDbClient => {
    if (db === undefined) {
      throw new Error(`Missing required dependency: db (needed for ${name})`);
    }
    return db;
  };

  return {
    subscriptionsRepo:
      repositories.subscriptionsRepo ??
      makeSubscriptionsRepo({ db: requireDb('subscriptionsRepo'), logger }),
    idempotencyRepo:
      repositories.idempotencyRepo ??
      makeIdempotencyRepo<PublishScope>({
        db: requireDb('idempotencyRepo'),
        logger,
        bindScope: (trx) => makePublishScope(trx, logger),
      }),
    issuesRepo:
      repositories.issuesRepo ?? makeIssuesRepo({ db: requireDb('issuesRepo'), logger }),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version } = options;
  const { config, logger } = deps;

  const { subscriptionsRepo, idempotencyRepo, issuesRepo } = resolveRepositories(deps);

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);
  await registerSecurityHeaders(app, config);

  // Every request gets an auth context; routes decide whether they need one
  if (deps.authProvider !== undefined) {
    app.addHook('preHandler', makeAuthMiddleware({ authProvider: deps.authProvider }));
  } else {
    logger.warn('No auth provider configured - publishing endpoints will reject every request');
    app.addHook('preHandler', async (request) => {
      request.auth = ANONYMOUS_SESSION;
    });
  }

  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: deps.healthCheckers ?? [],
    })
  );

  await app.register(
    makeSubscriptionRoutes({
      subscriptionsRepo,
      tokenGenerator: deps.tokenGenerator ?? makeTokenGenerator(),
      emailSender: deps.emailSender,
      baseUrl: config.server.baseUrl,
    })
  );

  await app.register(makeIssueRoutes({ idempotencyRepo, issuesRepo, logger }));

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation != null) {
      request.log.info({ err: error }, 'Request validation failed');
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Request error');

    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
