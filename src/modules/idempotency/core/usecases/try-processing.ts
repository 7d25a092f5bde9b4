/**
 * Try Processing Use Case
 *
 * Claims (user, key) for the caller or hands back the stored response.
 */

import type { IdempotencyError } from '../errors.js';
import type { IdempotencyRepository, ProcessingHandle } from '../ports.js';
import type { IdempotencyKey, NextAction } from '../types.js';
import type { Result } from 'neverthrow';

export interface TryProcessingDeps<TScope> {
  idempotencyRepo: IdempotencyRepository<TScope>;
}

export interface TryProcessingInput {
  userId: string;
  key: IdempotencyKey;
}

export async function tryProcessing<TScope>(
  deps: TryProcessingDeps<TScope>,
  input: TryProcessingInput
): Promise<Result<NextAction<ProcessingHandle<TScope>>, IdempotencyError>> {
  return deps.idempotencyRepo.tryProcessing(input.userId, input.key);
}
