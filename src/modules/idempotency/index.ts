/**
 * Idempotency Module Public API
 */

export type {
  IdempotencyKey,
  HeaderPair,
  SavedResponse,
  ProcessingState,
  NextAction,
  StartProcessing,
  ReturnSavedResponse,
} from './core/types.js';
export type { IdempotencyError } from './core/errors.js';
export type { IdempotencyRepository, ProcessingHandle } from './core/ports.js';

export {
  createInvalidIdempotencyKeyError,
  createIdempotencyInProgressError,
  createTransactionClosedError,
  createDatabaseError as createIdempotencyDatabaseError,
  IDEMPOTENCY_ERROR_HTTP_STATUS,
} from './core/errors.js';

export { parseIdempotencyKey } from './core/key.js';
export { createProcessingHandle, type CreateProcessingHandleParams } from './core/processing-handle.js';
export { tryProcessing, type TryProcessingDeps } from './core/usecases/try-processing.js';
export { saveResponse } from './core/usecases/save-response.js';
export { purgeExpiredKeys, type PurgeExpiredKeysDeps } from './core/usecases/purge-expired-keys.js';

export { makeIdempotencyRepo, type IdempotencyRepoConfig } from './shell/repo/idempotency-repo.js';
export {
  runIdempotencyCleanupWorker,
  DEFAULT_CLEANUP_INTERVAL_MS,
  type CleanupWorkerDeps,
  type CleanupWorkerOptions,
} from './shell/workers/cleanup-worker.js';
