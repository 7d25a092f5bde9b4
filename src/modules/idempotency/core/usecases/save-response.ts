/**
 * Save Response Use Case
 *
 * Stores the response on the idempotency record and commits the handle's
 * transaction, so the record and every write made through the scope land
 * together or not at all.
 */

import { err, type Result } from 'neverthrow';

import { createTransactionClosedError, type IdempotencyError } from '../errors.js';

import type { ProcessingHandle } from '../ports.js';
import type { SavedResponse } from '../types.js';

export async function saveResponse<TScope>(
  handle: ProcessingHandle<TScope>,
  response: SavedResponse
): Promise<Result<SavedResponse, IdempotencyError>> {
  if (handle.state !== 'open') {
    return err(createTransactionClosedError(handle.state));
  }
  return handle.complete(response);
}
