/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig, type AppConfig } from './infra/config/index.js';
import { initDatabase } from './infra/database/client.js';
import { initEmailClient } from './infra/email/client.js';
import { buildLoggerOptions, createLogger } from './infra/logger/index.js';
import { makeJWTAdapter, type AuthProvider } from './modules/auth/index.js';
import { makeDbHealthChecker } from './modules/health/index.js';

import type { Logger } from 'pino';

/**
 * Creates the bearer token verifier, or nothing when no public key is set.
 */
const createAuthProvider = (config: AppConfig, logger: Logger): AuthProvider | undefined => {
  const { jwtPublicKey, jwtIssuer, jwtAudience } = config.auth;

  if (jwtPublicKey === undefined) {
    logger.warn('AUTH_JWT_PUBLIC_KEY not configured - authentication disabled');
    return undefined;
  }

  return makeJWTAdapter({
    publicKeyPEM: jwtPublicKey,
    algorithm: 'RS256',
    ...(jwtIssuer !== undefined && { issuer: jwtIssuer }),
    ...(jwtAudience !== undefined && { audience: jwtAudience }),
  });
};

const main = async (): Promise<void> => {
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger(config.logger, 'api');

  logger.info({ config: { server: config.server } }, 'Starting API server');

  const db = initDatabase(config);
  const emailSender = initEmailClient(config, logger);
  const authProvider = createAuthProvider(config, logger);

  const app = await buildApp({
    fastifyOptions: {
      logger: buildLoggerOptions(config.logger, 'api'),
    },
    deps: {
      config,
      logger,
      db,
      emailSender,
      healthCheckers: [makeDbHealthChecker(db, { name: 'database' })],
      ...(authProvider !== undefined && { authProvider }),
    },
    version: process.env['APP_VERSION'],
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await db.destroy();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
