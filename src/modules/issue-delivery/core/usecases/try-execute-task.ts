/**
 * Try Execute Task Use Case
 *
 * One worker iteration: claim a task, attempt the send, record the outcome
 * on the claim. Errors returned here are infrastructure failures; delivery
 * failures are recorded on the task and reported as TaskCompleted.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  parseSubscriberEmail,
  parseSubscriberName,
} from '../../../subscriptions/core/subscriber.js';
import { buildIssueEmail } from '../issue-email.js';
import { decideResolution } from '../policy.js';

import type { DeliveryError } from '../errors.js';
import type { ClaimedTask, DeliveryContentReader, DeliveryQueue, IssueEmailSender } from '../ports.js';
import type {
  DeliveryAttemptOutcome,
  DeliveryTask,
  ExecutionOutcome,
  RetryPolicy,
} from '../types.js';
import type { Logger } from 'pino';

export interface TryExecuteTaskDeps {
  queue: DeliveryQueue;
  contentReader: DeliveryContentReader;
  emailSender: IssueEmailSender;
  retryPolicy: RetryPolicy;
  /** Public base URL the unsubscribe footer links to */
  baseUrl: string;
  logger: Logger;
  now?: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Delivery Attempt
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Loads what the send needs and tries it once.
 */
async function attemptDelivery(
  deps: TryExecuteTaskDeps,
  task: DeliveryTask
): Promise<Result<DeliveryAttemptOutcome, DeliveryError>> {
  const { contentReader, emailSender } = deps;

  const contactResult = await contentReader.getSubscriberContact(task.subscriberId);
  if (contactResult.isErr()) {
    return err(contactResult.error);
  }
  const contact = contactResult.value;
  if (contact === null) {
    return ok({ kind: 'PermanentlyInvalid', reason: 'Subscriber no longer exists' });
  }

  const name = parseSubscriberName(contact.name);
  if (name.isErr()) {
    return ok({ kind: 'PermanentlyInvalid', reason: name.error.message });
  }
  const email = parseSubscriberEmail(contact.email);
  if (email.isErr()) {
    return ok({ kind: 'PermanentlyInvalid', reason: email.error.message });
  }
  if (contact.subscriptionToken === null) {
    return ok({ kind: 'PermanentlyInvalid', reason: 'Subscriber has no subscription token' });
  }

  const issueResult = await contentReader.getIssueContent(task.issueId);
  if (issueResult.isErr()) {
    return err(issueResult.error);
  }
  const issue = issueResult.value;
  if (issue === null) {
    return ok({ kind: 'PermanentlyInvalid', reason: 'Issue no longer exists' });
  }

  const sent = await emailSender.send(
    buildIssueEmail(
      issue,
      {
        subscriberId: task.subscriberId,
        email: email.value,
        subscriptionToken: contact.subscriptionToken,
      },
      deps.baseUrl
    )
  );

  if (sent.isErr()) {
    return ok({ kind: 'TransientFailure', reason: sent.error.message });
  }
  return ok({ kind: 'Delivered' });
}

/**
 * Rolls the claim back after an infrastructure failure, keeping the
 * original error as the one reported.
 */
async function releaseAfterFailure(
  claim: ClaimedTask,
  error: DeliveryError,
  log: Logger
): Promise<Result<never, DeliveryError>> {
  const released = await claim.release();
  if (released.isErr()) {
    log.error({ error: released.error }, 'Failed to release delivery task claim');
  }
  return err(error);
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

export async function tryExecuteTask(
  deps: TryExecuteTaskDeps
): Promise<Result<ExecutionOutcome, DeliveryError>> {
  const { queue, retryPolicy } = deps;
  const now = deps.now ?? (() => new Date());

  const claimResult = await queue.dequeueTask();
  if (claimResult.isErr()) {
    return err(claimResult.error);
  }

  const claim = claimResult.value;
  if (claim === null) {
    const emptyResult = await queue.isEmpty();
    if (emptyResult.isErr()) {
      return err(emptyResult.error);
    }
    return ok(emptyResult.value ? { kind: 'EmptyQueue' } : { kind: 'PostponedTasks' });
  }

  const { task } = claim;
  const log = deps.logger.child({
    issueId: task.issueId,
    subscriberId: task.subscriberId,
    retryCount: task.retryCount,
  });

  const outcomeResult = await attemptDelivery(deps, task);
  if (outcomeResult.isErr()) {
    return releaseAfterFailure(claim, outcomeResult.error, log);
  }

  const outcome = outcomeResult.value;
  const resolution = decideResolution(task, outcome, retryPolicy, now());

  const recorded = await claim.resolve(resolution);
  if (recorded.isErr()) {
    return err(recorded.error);
  }

  switch (resolution.kind) {
    case 'delivered':
      log.info('Issue delivered');
      break;
    case 'failed':
      log.error({ reason: resolution.reason }, 'Issue delivery failed permanently');
      break;
    case 'retry':
      log.warn(
        {
          reason: outcome.kind === 'TransientFailure' ? outcome.reason : undefined,
          executeAfter: resolution.executeAfter.toISOString(),
        },
        'Issue delivery failed, retry scheduled'
      );
      break;
  }

  return ok({ kind: 'TaskCompleted', task, resolution });
}
