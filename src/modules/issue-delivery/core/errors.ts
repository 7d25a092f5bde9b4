/**
 * Issue Delivery Module - Domain Errors
 *
 * Only infrastructure failures surface as errors. Delivery failures are
 * outcomes, recorded on the task.
 */

export interface DeliveryDatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * The claim was already resolved or released.
 */
export interface ClaimClosedError {
  readonly type: 'ClaimClosedError';
  readonly message: string;
}

export type DeliveryError = DeliveryDatabaseError | ClaimClosedError;

export const createDatabaseError = (message: string, cause?: unknown): DeliveryDatabaseError => ({
  type: 'DatabaseError',
  message,
  cause,
});

export const createClaimClosedError = (state: 'resolved' | 'released'): ClaimClosedError => ({
  type: 'ClaimClosedError',
  message: `Delivery task claim was already ${state}`,
});
