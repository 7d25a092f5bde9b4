/**
 * One-shot delivery entry point
 *
 * Works through every task that is due right now, logs the summary and
 * exits. Exits with 1 when the queue could not be read.
 */

import { parseEnv, createConfig } from './infra/config/index.js';
import { initDatabase } from './infra/database/client.js';
import { initEmailClient } from './infra/email/client.js';
import { createLogger } from './infra/logger/index.js';
import {
  drainDeliveryQueue,
  makeDeliveryContentRepo,
  makeDeliveryQueueRepo,
  makeIssueEmailSender,
  parseDrainArgs,
} from './modules/issue-delivery/index.js';

const main = async (): Promise<number> => {
  const env = parseEnv(process.env);
  const config = createConfig(env);
  const logger = createLogger(config.logger, 'drain');

  const options = parseDrainArgs(process.argv.slice(2));
  if (options.isErr()) {
    logger.error(options.error);
    return 1;
  }

  const db = initDatabase(config);
  try {
    const result = await drainDeliveryQueue(
      {
        queue: makeDeliveryQueueRepo({ db, logger }),
        contentReader: makeDeliveryContentRepo({ db, logger }),
        emailSender: makeIssueEmailSender({ emailSender: initEmailClient(config, logger) }),
        retryPolicy: config.delivery,
        baseUrl: config.server.baseUrl,
        logger,
      },
      options.value
    );

    if (result.isErr()) {
      logger.error({ error: result.error }, 'Drain stopped on a queue error');
      return 1;
    }

    logger.info(result.value, 'Drain finished');
    return 0;
  } finally {
    await db.destroy();
  }
};

await main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
