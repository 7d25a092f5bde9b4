/**
 * Issue Delivery Module Public API
 */

export type {
  DeliveryTask,
  ClaimState,
  IssueContent,
  StoredSubscriberContact,
  DeliveryAttemptOutcome,
  TaskResolution,
  ExecutionOutcome,
  RetryPolicy,
} from './core/types.js';
export { DEFAULT_RETRY_POLICY } from './core/types.js';

export type { DeliveryError } from './core/errors.js';
export { createDatabaseError as createDeliveryDatabaseError } from './core/errors.js';

export type {
  ClaimedTask,
  DeliveryQueue,
  DeliveryContentReader,
  IssueEmail,
  IssueEmailSender,
} from './core/ports.js';

export { createClaimedTask, type CreateClaimedTaskParams } from './core/claim.js';
export { decideResolution } from './core/policy.js';
export { buildIssueEmail, type IssueRecipient } from './core/issue-email.js';
export {
  DEFAULT_BACKOFF_POLICY,
  initialBackoffState,
  nextBackoff,
  type BackoffPolicy,
  type BackoffState,
  type BackoffStep,
} from './core/backoff.js';

export { tryExecuteTask, type TryExecuteTaskDeps } from './core/usecases/try-execute-task.js';
export {
  runDeliveryWorker,
  type RunDeliveryWorkerDeps,
  type RunDeliveryWorkerOptions,
  type DeliveryWorkerStats,
} from './core/usecases/run-delivery-worker.js';
export {
  drainDeliveryQueue,
  type DrainSummary,
  type DrainDeliveryQueueOptions,
} from './core/usecases/drain-delivery-queue.js';

export {
  makeDeliveryQueueRepo,
  type DeliveryQueueRepoConfig,
} from './shell/repo/delivery-queue-repo.js';
export {
  makeDeliveryContentRepo,
  type DeliveryContentRepoConfig,
} from './shell/repo/delivery-content-repo.js';
export { makeIssueEmailSender } from './shell/email/issue-email-sender.js';
export { parseDrainArgs } from './shell/cli/drain-args.js';
