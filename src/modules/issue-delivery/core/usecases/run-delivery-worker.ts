/**
 * Run Delivery Worker Use Case
 *
 * Drives the queue forever: no sleep while tasks complete, a growing wait
 * while tasks exist but none is claimable, a long wait on an empty queue and
 * a short one after an infrastructure error. Stops only when `signal` aborts.
 */

import { sleep as defaultSleep, type Sleep } from '../../../../common/timing/sleep.js';
import {
  DEFAULT_BACKOFF_POLICY,
  initialBackoffState,
  nextBackoff,
  type BackoffPolicy,
} from '../backoff.js';

import { tryExecuteTask, type TryExecuteTaskDeps } from './try-execute-task.js';

export interface RunDeliveryWorkerDeps extends TryExecuteTaskDeps {
  sleep?: Sleep;
}

export interface RunDeliveryWorkerOptions {
  signal?: AbortSignal;
  backoff?: BackoffPolicy;
}

export interface DeliveryWorkerStats {
  iterations: number;
  tasksCompleted: number;
  infrastructureErrors: number;
}

export async function runDeliveryWorker(
  deps: RunDeliveryWorkerDeps,
  options: RunDeliveryWorkerOptions = {}
): Promise<DeliveryWorkerStats> {
  const { signal, backoff = DEFAULT_BACKOFF_POLICY } = options;
  const sleep = deps.sleep ?? defaultSleep;
  const log = deps.logger.child({ worker: 'issue-delivery' });
  const iterationDeps = { ...deps, logger: log };

  const stats: DeliveryWorkerStats = { iterations: 0, tasksCompleted: 0, infrastructureErrors: 0 };
  let state = initialBackoffState(backoff);

  log.info({ retryPolicy: deps.retryPolicy }, 'Delivery worker started');

  while (signal?.aborted !== true) {
    const result = await tryExecuteTask(iterationDeps);
    stats.iterations += 1;

    let outcome: Parameters<typeof nextBackoff>[1];
    if (result.isErr()) {
      stats.infrastructureErrors += 1;
      log.error({ error: result.error }, 'Delivery iteration failed');
      outcome = 'InfrastructureError';
    } else {
      outcome = result.value.kind;
      if (outcome === 'TaskCompleted') {
        stats.tasksCompleted += 1;
      }
    }

    const step = nextBackoff(state, outcome, backoff);
    state = step.next;

    if (step.sleepMs > 0) {
      log.trace({ outcome, sleepMs: step.sleepMs }, 'Delivery worker sleeping');
      await sleep(step.sleepMs, signal);
    }
  }

  log.info(stats, 'Delivery worker stopped');
  return stats;
}
