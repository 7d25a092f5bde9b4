/**
 * Issue Delivery Module - Domain Types
 *
 * Every published issue fans out into one task per confirmed subscriber.
 * A worker claims a task, tries to send, and resolves it as delivered,
 * failed or due for a retry.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Queue
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One unresolved (issue, subscriber) send obligation.
 */
export interface DeliveryTask {
  readonly issueId: string;
  readonly subscriberId: string;
  /** Failed attempts so far */
  readonly retryCount: number;
  /** The task is not claimable before this instant */
  readonly executeAfter: Date;
}

/**
 * `open` until the claim is resolved or released.
 */
export type ClaimState = 'open' | 'resolved' | 'released';

// ─────────────────────────────────────────────────────────────────────────────
// Content
// ─────────────────────────────────────────────────────────────────────────────

export interface IssueContent {
  readonly issueId: string;
  readonly title: string;
  readonly htmlContent: string;
  readonly textContent: string;
}

/**
 * Contact details as stored; not yet validated.
 */
export interface StoredSubscriberContact {
  readonly subscriberId: string;
  readonly email: string;
  readonly name: string;
  /** Null when the subscriber has no token row */
  readonly subscriptionToken: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Outcomes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Result of one send attempt.
 */
export type DeliveryAttemptOutcome =
  | { readonly kind: 'Delivered' }
  | { readonly kind: 'PermanentlyInvalid'; readonly reason: string }
  | { readonly kind: 'TransientFailure'; readonly reason: string };

/**
 * What gets recorded on the claimed task.
 */
export type TaskResolution =
  | { readonly kind: 'delivered' }
  | { readonly kind: 'failed'; readonly reason: string }
  | { readonly kind: 'retry'; readonly retryCount: number; readonly executeAfter: Date };

/**
 * Result of one worker iteration.
 */
export type ExecutionOutcome =
  | {
      readonly kind: 'TaskCompleted';
      readonly task: DeliveryTask;
      readonly resolution: TaskResolution;
    }
  | { readonly kind: 'EmptyQueue' }
  | { readonly kind: 'PostponedTasks' };

// ─────────────────────────────────────────────────────────────────────────────
// Policy
// ─────────────────────────────────────────────────────────────────────────────

export interface RetryPolicy {
  /** Transient failures tolerated before the task counts as failed */
  readonly maxRetries: number;
  /** Delay before a retried task becomes claimable again */
  readonly retryDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  retryDelayMs: 60_000,
};
