/**
 * Issue Delivery Module - Ports
 */

import type { DeliveryError } from './errors.js';
import type {
  ClaimState,
  DeliveryTask,
  IssueContent,
  StoredSubscriberContact,
  TaskResolution,
} from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Queue
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A task locked by this worker inside an open transaction.
 *
 * Ends with exactly one of `resolve` (record the outcome and commit) or
 * `release` (roll back, leaving the task untouched for the next claim).
 */
export interface ClaimedTask {
  readonly task: DeliveryTask;
  readonly state: ClaimState;
  resolve(resolution: TaskResolution): Promise<Result<void, DeliveryError>>;
  release(): Promise<Result<void, DeliveryError>>;
}

export interface DeliveryQueue {
  /**
   * Locks one eligible task, skipping tasks locked by other workers.
   * Returns null when nothing is claimable right now.
   */
  dequeueTask(): Promise<Result<ClaimedTask | null, DeliveryError>>;

  /** True when the queue holds no task at all, eligible or not. */
  isEmpty(): Promise<Result<boolean, DeliveryError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Lookups
// ─────────────────────────────────────────────────────────────────────────────

export interface DeliveryContentReader {
  getIssueContent(issueId: string): Promise<Result<IssueContent | null, DeliveryError>>;
  getSubscriberContact(
    subscriberId: string
  ): Promise<Result<StoredSubscriberContact | null, DeliveryError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Transport
// ─────────────────────────────────────────────────────────────────────────────

export interface IssueEmail {
  readonly to: string;
  readonly subject: string;
  readonly html: string;
  readonly text: string;
  /** Stable per (issue, subscriber) so transport-level retries collapse */
  readonly idempotencyKey: string;
}

/**
 * Outbound transport. Every error is treated as transient.
 */
export interface IssueEmailSender {
  send(email: IssueEmail): Promise<Result<void, { message: string }>>;
}
