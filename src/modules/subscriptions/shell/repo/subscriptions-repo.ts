/**
 * Subscriptions Repository Implementation
 *
 * Kysely-based implementation over `subscriptions` and `subscription_tokens`.
 */

import { randomUUID } from 'crypto';

import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type SubscriptionError } from '../../core/errors.js';

import type { SubscriptionsRepository } from '../../core/ports.js';
import type { NewSubscriber } from '../../core/subscriber.js';
import type { PendingSubscription, Subscription } from '../../core/types.js';
import type { NewsletterDbClient } from '../../../../infra/database/client.js';
import type { Logger } from 'pino';

export interface SubscriptionsRepoOptions {
  db: NewsletterDbClient;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselySubscriptionsRepo implements SubscriptionsRepository {
  private readonly db: NewsletterDbClient;
  private readonly log: Logger;

  constructor(options: SubscriptionsRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'SubscriptionsRepo' });
  }

  async createPending(
    subscriber: NewSubscriber,
    token: string
  ): Promise<Result<PendingSubscription, SubscriptionError>> {
    try {
      const pending = await this.db.transaction().execute(async (trx) => {
        const inserted = await trx
          .insertInto('subscriptions')
          .values({
            id: randomUUID(),
            email: subscriber.email,
            name: subscriber.name,
            status: 'pending_confirmation',
          })
          .onConflict((oc) => oc.column('email').doNothing())
          .returning('id')
          .executeTakeFirst();

        if (inserted !== undefined) {
          await trx
            .insertInto('subscription_tokens')
            .values({ subscription_token: token, subscriber_id: inserted.id })
            .execute();
          return { subscriberId: inserted.id, token, created: true };
        }

        const existing = await trx
          .selectFrom('subscriptions')
          .innerJoin(
            'subscription_tokens',
            'subscription_tokens.subscriber_id',
            'subscriptions.id'
          )
          .select(['subscriptions.id', 'subscription_tokens.subscription_token'])
          .where('subscriptions.email', '=', subscriber.email)
          .executeTakeFirstOrThrow();

        return {
          subscriberId: existing.id,
          token: existing.subscription_token,
          created: false,
        };
      });

      this.log.info(
        { subscriberId: pending.subscriberId, created: pending.created },
        'Pending subscription stored'
      );
      return ok(pending);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to store pending subscription');
      return err(createDatabaseError('Failed to store pending subscription', error));
    }
  }

  async findSubscriberIdByToken(token: string): Promise<Result<string | null, SubscriptionError>> {
    try {
      const row = await this.db
        .selectFrom('subscription_tokens')
        .select('subscriber_id')
        .where('subscription_token', '=', token)
        .executeTakeFirst();

      return ok(row?.subscriber_id ?? null);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to look up subscription token');
      return err(createDatabaseError('Failed to look up subscription token', error));
    }
  }

  async findById(subscriberId: string): Promise<Result<Subscription | null, SubscriptionError>> {
    try {
      const row = await this.db
        .selectFrom('subscriptions')
        .select(['id', 'email', 'name', 'status', 'subscribed_at'])
        .where('id', '=', subscriberId)
        .executeTakeFirst();

      if (row === undefined) {
        return ok(null);
      }
      return ok({
        id: row.id,
        email: row.email,
        name: row.name,
        status: row.status,
        subscribedAt: row.subscribed_at,
      });
    } catch (error) {
      this.log.error({ err: error, subscriberId }, 'Failed to find subscription');
      return err(createDatabaseError('Failed to find subscription', error));
    }
  }

  async confirm(subscriberId: string): Promise<Result<boolean, SubscriptionError>> {
    try {
      const result = await this.db
        .updateTable('subscriptions')
        .set({ status: 'confirmed' })
        .where('id', '=', subscriberId)
        .where('status', '=', 'pending_confirmation')
        .executeTakeFirst();

      const confirmed = result.numUpdatedRows > 0n;
      this.log.info({ subscriberId, confirmed }, 'Subscription confirmation processed');
      return ok(confirmed);
    } catch (error) {
      this.log.error({ err: error, subscriberId }, 'Failed to confirm subscription');
      return err(createDatabaseError('Failed to confirm subscription', error));
    }
  }

  async remove(subscriberId: string): Promise<Result<void, SubscriptionError>> {
    try {
      // Tokens cascade; queued deliveries stay and resolve as failed
      await this.db.deleteFrom('subscriptions').where('id', '=', subscriberId).execute();
      this.log.info({ subscriberId }, 'Subscription removed');
      return ok(undefined);
    } catch (error) {
      this.log.error({ err: error, subscriberId }, 'Failed to remove subscription');
      return err(createDatabaseError('Failed to remove subscription', error));
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

export const makeSubscriptionsRepo = (options: SubscriptionsRepoOptions): SubscriptionsRepository => {
  return new KyselySubscriptionsRepo(options);
};
