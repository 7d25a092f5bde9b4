/**
 * Claimed task state machine.
 *
 * Queue adapters supply `record` (write the resolution and commit) and
 * `rollback`; this wrapper allows exactly one of them to run, once.
 */

import { err, type Result } from 'neverthrow';

import { createClaimClosedError, type DeliveryError } from './errors.js';

import type { ClaimedTask } from './ports.js';
import type { ClaimState, DeliveryTask, TaskResolution } from './types.js';

export interface CreateClaimedTaskParams {
  task: DeliveryTask;
  record: (resolution: TaskResolution) => Promise<Result<void, DeliveryError>>;
  rollback: () => Promise<Result<void, DeliveryError>>;
}

export function createClaimedTask(params: CreateClaimedTaskParams): ClaimedTask {
  const { task, record, rollback } = params;
  let state: ClaimState = 'open';

  return {
    task,
    get state() {
      return state;
    },

    async resolve(resolution) {
      if (state !== 'open') {
        return err(createClaimClosedError(state));
      }
      state = 'resolved';
      return record(resolution);
    },

    async release() {
      if (state !== 'open') {
        return err(createClaimClosedError(state));
      }
      state = 'released';
      return rollback();
    },
  };
}
