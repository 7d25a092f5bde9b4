/**
 * Idempotency Module - Domain Errors
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export interface InvalidIdempotencyKeyError {
  readonly type: 'InvalidIdempotencyKeyError';
  readonly message: string;
  readonly rawKey: string;
}

/**
 * A record exists for the key but holds no response yet.
 */
export interface IdempotencyInProgressError {
  readonly type: 'IdempotencyInProgressError';
  readonly message: string;
}

/**
 * The processing handle was already completed or aborted.
 */
export interface TransactionClosedError {
  readonly type: 'TransactionClosedError';
  readonly message: string;
}

export interface IdempotencyDatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly cause?: unknown;
}

export type IdempotencyError =
  | InvalidIdempotencyKeyError
  | IdempotencyInProgressError
  | TransactionClosedError
  | IdempotencyDatabaseError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createInvalidIdempotencyKeyError = (rawKey: string): InvalidIdempotencyKeyError => ({
  type: 'InvalidIdempotencyKeyError',
  message: 'The idempotency key must be a valid UUID.',
  rawKey,
});

export const createIdempotencyInProgressError = (): IdempotencyInProgressError => ({
  type: 'IdempotencyInProgressError',
  message: 'A request with this idempotency key is still being processed. Retry later.',
});

export const createTransactionClosedError = (
  state: 'completed' | 'aborted'
): TransactionClosedError => ({
  type: 'TransactionClosedError',
  message: `Idempotent processing was already ${state}`,
});

export const createDatabaseError = (message: string, cause?: unknown): IdempotencyDatabaseError => ({
  type: 'DatabaseError',
  message,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const IDEMPOTENCY_ERROR_HTTP_STATUS: Record<IdempotencyError['type'], number> = {
  InvalidIdempotencyKeyError: 400,
  IdempotencyInProgressError: 409,
  TransactionClosedError: 500,
  DatabaseError: 500,
};
