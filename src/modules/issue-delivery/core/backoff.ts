/**
 * Worker loop pacing.
 *
 * The state is a plain value threaded through loop iterations.
 */

import type { ExecutionOutcome } from './types.js';

export interface BackoffPolicy {
  /** First wait after tasks turn out to be postponed */
  readonly floorMs: number;
  readonly factor: number;
  /** The postponed wait stops growing once it reaches this */
  readonly capMs: number;
  readonly emptyQueueMs: number;
  readonly errorMs: number;
}

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  floorMs: 10,
  factor: 10,
  capMs: 10_000,
  emptyQueueMs: 10_000,
  errorMs: 1_000,
};

export interface BackoffState {
  readonly postponedWaitMs: number;
}

export interface BackoffStep {
  readonly sleepMs: number;
  readonly next: BackoffState;
}

export const initialBackoffState = (policy: BackoffPolicy): BackoffState => ({
  postponedWaitMs: policy.floorMs,
});

/**
 * How long to sleep after an iteration, and the state for the next one.
 * `InfrastructureError` stands for a claim or bookkeeping failure.
 */
export function nextBackoff(
  state: BackoffState,
  outcome: ExecutionOutcome['kind'] | 'InfrastructureError',
  policy: BackoffPolicy
): BackoffStep {
  const reset = initialBackoffState(policy);

  switch (outcome) {
    case 'TaskCompleted':
      return { sleepMs: 0, next: reset };
    case 'EmptyQueue':
      return { sleepMs: policy.emptyQueueMs, next: reset };
    case 'InfrastructureError':
      return { sleepMs: policy.errorMs, next: reset };
    case 'PostponedTasks': {
      const current = state.postponedWaitMs;
      const grown =
        current < policy.capMs ? Math.min(current * policy.factor, policy.capMs) : current;
      return { sleepMs: current, next: { postponedWaitMs: grown } };
    }
  }
}
