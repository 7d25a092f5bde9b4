/**
 * Delivery Content Repository
 *
 * Reads issue bodies and subscriber contacts for the worker. Outside the
 * claim transaction: both are read-only here.
 */

import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type DeliveryError } from '../../core/errors.js';

import type { DeliveryContentReader } from '../../core/ports.js';
import type { IssueContent, StoredSubscriberContact } from '../../core/types.js';
import type { NewsletterDbClient } from '../../../../infra/database/client.js';
import type { Logger } from 'pino';

export interface DeliveryContentRepoConfig {
  db: NewsletterDbClient;
  logger: Logger;
}

export const makeDeliveryContentRepo = (
  config: DeliveryContentRepoConfig
): DeliveryContentReader => {
  const { db } = config;
  const log = config.logger.child({ repo: 'DeliveryContentRepo' });

  return {
    async getIssueContent(issueId: string): Promise<Result<IssueContent | null, DeliveryError>> {
      try {
        const row = await db
          .selectFrom('newsletter_issues')
          .select(['issue_id', 'title', 'html_content', 'text_content'])
          .where('issue_id', '=', issueId)
          .executeTakeFirst();

        if (row === undefined) {
          return ok(null);
        }
        return ok({
          issueId: row.issue_id,
          title: row.title,
          htmlContent: row.html_content,
          textContent: row.text_content,
        });
      } catch (error) {
        log.error({ err: error, issueId }, 'Failed to load issue content');
        return err(
          createDatabaseError(error instanceof Error ? error.message : 'Unknown error', error)
        );
      }
    },

    async getSubscriberContact(
      subscriberId: string
    ): Promise<Result<StoredSubscriberContact | null, DeliveryError>> {
      try {
        const row = await db
          .selectFrom('subscriptions')
          .leftJoin(
            'subscription_tokens',
            'subscription_tokens.subscriber_id',
            'subscriptions.id'
          )
          .select([
            'subscriptions.id',
            'subscriptions.email',
            'subscriptions.name',
            'subscription_tokens.subscription_token',
          ])
          .where('subscriptions.id', '=', subscriberId)
          .executeTakeFirst();

        if (row === undefined) {
          return ok(null);
        }
        return ok({
          subscriberId: row.id,
          email: row.email,
          name: row.name,
          subscriptionToken: row.subscription_token,
        });
      } catch (error) {
        log.error({ err: error, subscriberId }, 'Failed to load subscriber contact');
        return err(
          createDatabaseError(error instanceof Error ? error.message : 'Unknown error', error)
        );
      }
    },
  };
};
