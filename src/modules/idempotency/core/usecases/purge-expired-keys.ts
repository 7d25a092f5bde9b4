/**
 * Purge Expired Keys Use Case
 */

import type { IdempotencyError } from '../errors.js';
import type { IdempotencyRepository } from '../ports.js';
import type { Result } from 'neverthrow';

export interface PurgeExpiredKeysDeps {
  idempotencyRepo: Pick<IdempotencyRepository<unknown>, 'deleteOlderThan'>;
}

export interface PurgeExpiredKeysInput {
  lifetimeMinutes: number;
}

/**
 * Deletes idempotency records older than the configured lifetime.
 * Returns how many were removed.
 */
export async function purgeExpiredKeys(
  deps: PurgeExpiredKeysDeps,
  input: PurgeExpiredKeysInput
): Promise<Result<number, IdempotencyError>> {
  return deps.idempotencyRepo.deleteOlderThan(Math.max(1, Math.floor(input.lifetimeMinutes)));
}
