/**
 * Idempotency Module - Domain Types
 *
 * A publish request carries a caller-chosen UUID. The first request to claim
 * (user, key) does the work and stores its HTTP response; every later request
 * with the same pair gets that stored response back.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Branded Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A caller-supplied key that has been checked to be a UUID.
 * Only `parseIdempotencyKey` produces values of this type.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- __brand is the standard pattern for branded types in TypeScript
export type IdempotencyKey = string & { readonly __brand: unique symbol };

// ─────────────────────────────────────────────────────────────────────────────
// Saved Responses
// ─────────────────────────────────────────────────────────────────────────────

export interface HeaderPair {
  readonly name: string;
  readonly value: string;
}

/**
 * Snapshot of the HTTP response produced by the request that did the work.
 */
export interface SavedResponse {
  readonly statusCode: number;
  readonly headers: readonly HeaderPair[];
  readonly body: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Processing Outcome
// ─────────────────────────────────────────────────────────────────────────────

/**
 * `open` until the handle is completed or aborted; no transition leads back.
 */
export type ProcessingState = 'open' | 'completed' | 'aborted';

export interface StartProcessing<THandle> {
  readonly action: 'StartProcessing';
  readonly handle: THandle;
}

export interface ReturnSavedResponse {
  readonly action: 'ReturnSavedResponse';
  readonly response: SavedResponse;
}

export type NextAction<THandle> = StartProcessing<THandle> | ReturnSavedResponse;
