/**
 * Processing handle state machine.
 *
 * Storage adapters supply `persist` and `discard`; this wrapper guarantees
 * that at most one of them runs and that nothing runs after either.
 */

import { err, ok, type Result } from 'neverthrow';

import { createTransactionClosedError, type IdempotencyError } from './errors.js';

import type { ProcessingHandle } from './ports.js';
import type { IdempotencyKey, ProcessingState, SavedResponse } from './types.js';

export interface CreateProcessingHandleParams<TScope> {
  userId: string;
  key: IdempotencyKey;
  scope: TScope;
  /** Store the response on the record and commit */
  persist: (response: SavedResponse) => Promise<Result<void, IdempotencyError>>;
  /** Roll back everything written through the scope */
  discard: () => Promise<Result<void, IdempotencyError>>;
}

export function createProcessingHandle<TScope>(
  params: CreateProcessingHandleParams<TScope>
): ProcessingHandle<TScope> {
  const { userId, key, scope, persist, discard } = params;
  let state: ProcessingState = 'open';

  return {
    userId,
    key,
    scope,
    get state() {
      return state;
    },

    async complete(response) {
      if (state !== 'open') {
        return err(createTransactionClosedError(state));
      }
      state = 'completed';

      const persisted = await persist(response);
      if (persisted.isErr()) {
        state = 'aborted';
        // The persist error is the one worth reporting
        await discard();
        return err(persisted.error);
      }

      return ok(response);
    },

    async abort() {
      if (state !== 'open') {
        return err(createTransactionClosedError(state));
      }
      state = 'aborted';
      return discard();
    },
  };
}
