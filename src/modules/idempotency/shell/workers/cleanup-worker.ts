/**
 * Idempotency Key Cleanup Worker
 *
 * Sweeps expired idempotency records on a fixed interval until aborted.
 * A failed sweep is logged and retried on the next tick.
 */

import { sleep as defaultSleep, type Sleep } from '../../../../common/timing/sleep.js';
import { purgeExpiredKeys, type PurgeExpiredKeysDeps } from '../../core/usecases/purge-expired-keys.js';

import type { Logger } from 'pino';

export interface CleanupWorkerDeps extends PurgeExpiredKeysDeps {
  logger: Logger;
  sleep?: Sleep;
}

export interface CleanupWorkerOptions {
  lifetimeMinutes: number;
  /** @default 600_000 (10 minutes) */
  intervalMs?: number;
  signal?: AbortSignal;
}

export const DEFAULT_CLEANUP_INTERVAL_MS = 10 * 60 * 1000;

/**
 * Runs until `signal` aborts. Resolves with the number of sweeps performed.
 */
export async function runIdempotencyCleanupWorker(
  deps: CleanupWorkerDeps,
  options: CleanupWorkerOptions
): Promise<number> {
  const { lifetimeMinutes, intervalMs = DEFAULT_CLEANUP_INTERVAL_MS, signal } = options;
  const sleep = deps.sleep ?? defaultSleep;
  const log = deps.logger.child({ worker: 'idempotency-cleanup' });

  log.info({ lifetimeMinutes, intervalMs }, 'Idempotency cleanup worker started');

  let sweeps = 0;
  while (signal?.aborted !== true) {
    const result = await purgeExpiredKeys(deps, { lifetimeMinutes });
    sweeps += 1;

    if (result.isErr()) {
      log.error({ error: result.error }, 'Idempotency key cleanup failed');
    } else if (result.value > 0) {
      log.info({ deleted: result.value }, 'Deleted expired idempotency keys');
    }

    await sleep(intervalMs, signal);
  }

  log.info({ sweeps }, 'Idempotency cleanup worker stopped');
  return sweeps;
}
