/**
 * Background worker entry point
 *
 * Runs the issue delivery loop and the idempotency key cleanup loop side by
 * side until SIGINT or SIGTERM aborts both.
 */

import { parseEnv, createConfig } from './infra/config/index.js';
import { initDatabase } from './infra/database/client.js';
import { initEmailClient } from './infra/email/client.js';
import { createLogger } from './infra/logger/index.js';
import { makeIdempotencyRepo, runIdempotencyCleanupWorker } from './modules/idempotency/index.js';
import {
  makeDeliveryContentRepo,
  makeDeliveryQueueRepo,
  makeIssueEmailSender,
  runDeliveryWorker,
} from './modules/issue-delivery/index.js';

const main = async (): Promise<void> => {
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger(config.logger, 'worker');

  const db = initDatabase(config);
  const emailSender = makeIssueEmailSender({ emailSender: initEmailClient(config, logger) });

  const controller = new AbortController();
  const stop = (signal: string): void => {
    logger.info({ signal }, 'Received shutdown signal');
    controller.abort();
  };
  process.on('SIGTERM', () => {
    stop('SIGTERM');
  });
  process.on('SIGINT', () => {
    stop('SIGINT');
  });

  logger.info(
    { delivery: config.delivery, idempotency: config.idempotency },
    'Starting background workers'
  );

  const delivery = runDeliveryWorker(
    {
      queue: makeDeliveryQueueRepo({ db, logger }),
      contentReader: makeDeliveryContentRepo({ db, logger }),
      emailSender,
      retryPolicy: config.delivery,
      baseUrl: config.server.baseUrl,
      logger,
    },
    { signal: controller.signal }
  ).then((stats) => {
    logger.info(stats, 'Delivery worker exited');
  });

  const cleanup = runIdempotencyCleanupWorker(
    {
      // Cleanup never opens a processing handle, so the scope is unused
      idempotencyRepo: makeIdempotencyRepo({ db, logger, bindScope: () => undefined }),
      logger,
    },
    {
      lifetimeMinutes: config.idempotency.keyLifetimeMinutes,
      intervalMs: config.idempotency.cleanupIntervalMs,
      signal: controller.signal,
    }
  ).then((sweeps) => {
    logger.info({ sweeps }, 'Idempotency cleanup worker exited');
  });

  try {
    await Promise.all([delivery, cleanup]);
  } finally {
    // One loop failing must not leave the other running
    controller.abort();
    await db.destroy();
  }
  logger.info('Workers stopped');
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
