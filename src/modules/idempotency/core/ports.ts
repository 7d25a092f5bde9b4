/**
 * Idempotency Module - Ports
 */

import type { IdempotencyError } from './errors.js';
import type { IdempotencyKey, NextAction, ProcessingState, SavedResponse } from './types.js';
import type { Result } from 'neverthrow';

/**
 * An open unit of work owned by the request that won the key.
 *
 * `scope` exposes whatever the caller needs to write inside the same
 * transaction as the idempotency record. The handle must end with exactly one
 * of `complete` (store the response and commit) or `abort` (roll back).
 */
export interface ProcessingHandle<TScope> {
  readonly userId: string;
  readonly key: IdempotencyKey;
  readonly scope: TScope;
  readonly state: ProcessingState;
  complete(response: SavedResponse): Promise<Result<SavedResponse, IdempotencyError>>;
  abort(): Promise<Result<void, IdempotencyError>>;
}

export interface IdempotencyRepository<TScope> {
  /**
   * Inserts an in-progress record for (userId, key) unless one exists.
   * Waits for a concurrent holder of the same key to finish first.
   */
  tryProcessing(
    userId: string,
    key: IdempotencyKey
  ): Promise<Result<NextAction<ProcessingHandle<TScope>>, IdempotencyError>>;

  /**
   * Deletes records created more than `lifetimeMinutes` ago. Returns the count.
   */
  deleteOlderThan(lifetimeMinutes: number): Promise<Result<number, IdempotencyError>>;
}
