/**
 * Publish Issue Use Case
 *
 * Accepts a newsletter issue for delivery at most once per
 * (user, idempotency key). Creating the issue, queueing one delivery task per
 * confirmed subscriber and saving the response commit together.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  parseIdempotencyKey,
  saveResponse,
  tryProcessing,
  type IdempotencyRepository,
  type ProcessingHandle,
  type SavedResponse,
} from '../../../idempotency/index.js';
import { validateIssueContent } from '../validation.js';

import type { PublishIssueError } from '../errors.js';
import type { PublishScope } from '../ports.js';
import type { EnqueuedIssue, IssueContentInput } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Dependencies
// ─────────────────────────────────────────────────────────────────────────────

export interface PublishIssueDeps {
  idempotencyRepo: IdempotencyRepository<PublishScope>;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Input / Output
// ─────────────────────────────────────────────────────────────────────────────

export interface PublishIssueInput extends IssueContentInput {
  userId: string;
  idempotencyKey: string;
  /** Builds the HTTP response that is stored and replayed for this key */
  renderResponse: (issue: EnqueuedIssue) => SavedResponse;
}

export interface PublishIssueOutput {
  readonly response: SavedResponse;
  /** True when the response was produced by an earlier request */
  readonly replayed: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Publishes a newsletter issue.
 *
 * - Validates the content, then the idempotency key, before touching storage
 * - Replays the stored response when the key was already used
 * - Otherwise snapshots the confirmed subscribers, queues the issue for each
 *   of them and stores the response
 */
export async function publishIssue(
  deps: PublishIssueDeps,
  input: PublishIssueInput
): Promise<Result<PublishIssueOutput, PublishIssueError>> {
  const { idempotencyRepo, logger } = deps;

  const contentResult = validateIssueContent(input);
  if (contentResult.isErr()) {
    return err(contentResult.error);
  }

  const keyResult = parseIdempotencyKey(input.idempotencyKey);
  if (keyResult.isErr()) {
    return err(keyResult.error);
  }

  const nextResult = await tryProcessing(
    { idempotencyRepo },
    { userId: input.userId, key: keyResult.value }
  );
  if (nextResult.isErr()) {
    return err(nextResult.error);
  }

  const next = nextResult.value;
  if (next.action === 'ReturnSavedResponse') {
    logger.info({ userId: input.userId }, 'Replaying saved publish response');
    return ok({ response: next.response, replayed: true });
  }

  const handle = next.handle;
  const enqueueResult = await enqueueForConfirmedSubscribers(handle.scope, contentResult.value);
  if (enqueueResult.isErr()) {
    await abortHandle(handle, logger);
    return err(enqueueResult.error);
  }

  // A failed save rolls the handle back
  const saved = await saveResponse(handle, input.renderResponse(enqueueResult.value));
  if (saved.isErr()) {
    return err(saved.error);
  }

  logger.info(
    {
      userId: input.userId,
      issueId: enqueueResult.value.issueId,
      subscribersAtPublish: enqueueResult.value.subscribersAtPublish,
    },
    'Newsletter issue published'
  );
  return ok({ response: saved.value, replayed: false });
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

async function enqueueForConfirmedSubscribers(
  scope: PublishScope,
  content: IssueContentInput
): Promise<Result<EnqueuedIssue, PublishIssueError>> {
  const subscribersResult = await scope.listConfirmedSubscriberIds();
  if (subscribersResult.isErr()) {
    return err(subscribersResult.error);
  }

  return scope.enqueueIssue({
    title: content.title,
    htmlContent: content.htmlContent,
    textContent: content.textContent,
    subscriberIds: subscribersResult.value,
  });
}

async function abortHandle(
  handle: ProcessingHandle<PublishScope>,
  logger: Logger
): Promise<void> {
  const aborted = await handle.abort();
  if (aborted.isErr()) {
    logger.error(
      { err: aborted.error, userId: handle.userId },
      'Failed to roll back publish transaction'
    );
  }
}
