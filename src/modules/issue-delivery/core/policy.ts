/**
 * Maps a delivery attempt to the resolution recorded on its task.
 */

import type { DeliveryAttemptOutcome, DeliveryTask, RetryPolicy, TaskResolution } from './types.js';

/**
 * Transient failures retry while `retryCount < maxRetries`, which bounds the
 * number of send attempts for one task to `maxRetries + 1`.
 */
export function decideResolution(
  task: DeliveryTask,
  outcome: DeliveryAttemptOutcome,
  policy: RetryPolicy,
  now: Date
): TaskResolution {
  switch (outcome.kind) {
    case 'Delivered':
      return { kind: 'delivered' };
    case 'PermanentlyInvalid':
      return { kind: 'failed', reason: outcome.reason };
    case 'TransientFailure':
      if (task.retryCount < policy.maxRetries) {
        return {
          kind: 'retry',
          retryCount: task.retryCount + 1,
          executeAfter: new Date(now.getTime() + policy.retryDelayMs),
        };
      }
      return {
        kind: 'failed',
        reason: `Retries exhausted after ${String(task.retryCount + 1)} attempts: ${outcome.reason}`,
      };
  }
}
