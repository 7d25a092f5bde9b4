/**
 * Newsletter Issues Repository
 *
 * `makePublishScope` binds the publish writes to the idempotency transaction;
 * `makeIssuesRepo` serves the read-only delivery overview.
 */

import { randomUUID } from 'crypto';

import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type IssueError } from '../../core/errors.js';

import type { IssuesRepository, PublishScope } from '../../core/ports.js';
import type { EnqueuedIssue, EnqueueIssueInput, NewsletterIssue } from '../../core/types.js';
import type { NewsletterDatabase } from '../../../../infra/database/types.js';
import type { Kysely, Selectable, Transaction } from 'kysely';
import type { Logger } from 'pino';

// Two bind parameters per task row; stays well under the PostgreSQL limit
const TASK_INSERT_CHUNK_SIZE = 1000;

type IssueRow = Selectable<NewsletterDatabase['newsletter_issues']>;

const toNewsletterIssue = (row: IssueRow): NewsletterIssue => ({
  issueId: row.issue_id,
  title: row.title,
  htmlContent: row.html_content,
  textContent: row.text_content,
  publishedAt: row.published_at,
  subscribersAtPublish: row.subscribers_at_publish,
  deliveredCount: row.delivered_count,
  failedCount: row.failed_count,
});

// ─────────────────────────────────────────────────────────────────────────────
// Publish Scope
// ─────────────────────────────────────────────────────────────────────────────

export const makePublishScope = (
  trx: Transaction<NewsletterDatabase>,
  logger: Logger
): PublishScope => {
  const log = logger.child({ repo: 'PublishScope' });

  return {
    async listConfirmedSubscriberIds(): Promise<Result<string[], IssueError>> {
      try {
        const rows = await trx
          .selectFrom('subscriptions')
          .select('id')
          .where('status', '=', 'confirmed')
          .execute();
        return ok(rows.map((row) => row.id));
      } catch (error) {
        log.error({ err: error }, 'Failed to list confirmed subscribers');
        return err(createDatabaseError('Failed to list confirmed subscribers', error));
      }
    },

    async enqueueIssue(input: EnqueueIssueInput): Promise<Result<EnqueuedIssue, IssueError>> {
      const issueId = randomUUID();
      const subscriberIds = [...new Set(input.subscriberIds)];

      try {
        await trx
          .insertInto('newsletter_issues')
          .values({
            issue_id: issueId,
            title: input.title,
            text_content: input.textContent,
            html_content: input.htmlContent,
          })
          .execute();

        let inserted = 0;
        for (let start = 0; start < subscriberIds.length; start += TASK_INSERT_CHUNK_SIZE) {
          const chunk = subscriberIds.slice(start, start + TASK_INSERT_CHUNK_SIZE);
          const result = await trx
            .insertInto('issue_delivery_queue')
            .values(chunk.map((subscriberId) => ({ issue_id: issueId, subscriber_id: subscriberId })))
            .onConflict((oc) => oc.columns(['issue_id', 'subscriber_id']).doNothing())
            .executeTakeFirst();
          inserted += Number(result.numInsertedOrUpdatedRows ?? 0n);
        }

        await trx
          .updateTable('newsletter_issues')
          .set({ subscribers_at_publish: inserted, delivered_count: 0, failed_count: 0 })
          .where('issue_id', '=', issueId)
          .execute();

        log.debug({ issueId, subscribersAtPublish: inserted }, 'Issue enqueued');
        return ok({ issueId, subscribersAtPublish: inserted });
      } catch (error) {
        log.error({ err: error, issueId }, 'Failed to enqueue issue');
        return err(createDatabaseError('Failed to enqueue issue', error));
      }
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Overview Repository
// ─────────────────────────────────────────────────────────────────────────────

export interface IssuesRepoConfig {
  db: Kysely<NewsletterDatabase>;
  logger: Logger;
}

export const makeIssuesRepo = (config: IssuesRepoConfig): IssuesRepository => {
  const { db } = config;
  const log = config.logger.child({ repo: 'IssuesRepo' });

  return {
    async listIssues(): Promise<Result<NewsletterIssue[], IssueError>> {
      try {
        const rows = await db
          .selectFrom('newsletter_issues')
          .selectAll()
          .orderBy('published_at', 'desc')
          .orderBy('issue_id')
          .execute();
        return ok(rows.map(toNewsletterIssue));
      } catch (error) {
        log.error({ err: error }, 'Failed to list issues');
        return err(createDatabaseError('Failed to list issues', error));
      }
    },

    async findIssue(issueId: string): Promise<Result<NewsletterIssue | null, IssueError>> {
      try {
        const row = await db
          .selectFrom('newsletter_issues')
          .selectAll()
          .where('issue_id', '=', issueId)
          .executeTakeFirst();
        return ok(row === undefined ? null : toNewsletterIssue(row));
      } catch (error) {
        log.error({ err: error, issueId }, 'Failed to find issue');
        return err(createDatabaseError('Failed to find issue', error));
      }
    },
  };
};
