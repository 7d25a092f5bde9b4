/**
 * Drain Delivery Queue Use Case
 *
 * Runs iterations back to back until nothing is claimable. Meant for
 * one-shot runs; the long-lived process uses `runDeliveryWorker`.
 */

import { ok, err, type Result } from 'neverthrow';

import { tryExecuteTask, type TryExecuteTaskDeps } from './try-execute-task.js';

import type { DeliveryError } from '../errors.js';

export interface DrainSummary {
  delivered: number;
  failed: number;
  retried: number;
  /** Why draining stopped */
  stoppedOn: 'EmptyQueue' | 'PostponedTasks' | 'Limit';
}

export interface DrainDeliveryQueueOptions {
  /** Upper bound on iterations. @default 10_000 */
  maxIterations?: number;
}

export async function drainDeliveryQueue(
  deps: TryExecuteTaskDeps,
  options: DrainDeliveryQueueOptions = {}
): Promise<Result<DrainSummary, DeliveryError>> {
  const { maxIterations = 10_000 } = options;
  const summary: DrainSummary = { delivered: 0, failed: 0, retried: 0, stoppedOn: 'Limit' };

  for (let i = 0; i < maxIterations; i += 1) {
    const result = await tryExecuteTask(deps);
    if (result.isErr()) {
      return err(result.error);
    }

    const outcome = result.value;
    if (outcome.kind !== 'TaskCompleted') {
      return ok({ ...summary, stoppedOn: outcome.kind });
    }

    switch (outcome.resolution.kind) {
      case 'delivered':
        summary.delivered += 1;
        break;
      case 'failed':
        summary.failed += 1;
        break;
      case 'retry':
        summary.retried += 1;
        break;
    }
  }

  return ok(summary);
}
