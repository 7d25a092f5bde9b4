/**
 * Delivery Queue Repository
 *
 * PostgreSQL work queue over `issue_delivery_queue`. A claim is a controlled
 * transaction holding a `FOR UPDATE SKIP LOCKED` row lock; concurrent workers
 * skip the row instead of waiting on it. If the process dies mid-claim the
 * database rolls the transaction back and the task becomes claimable again.
 */

import { sql, type ControlledTransaction, type Kysely } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import { createClaimedTask } from '../../core/claim.js';
import { createDatabaseError, type DeliveryError } from '../../core/errors.js';

import type { ClaimedTask, DeliveryQueue } from '../../core/ports.js';
import type { DeliveryTask, TaskResolution } from '../../core/types.js';
import type { NewsletterDatabase } from '../../../../infra/database/types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface DeliveryQueueRepoConfig {
  db: Kysely<NewsletterDatabase>;
  logger: Logger;
}

type ClaimTransaction = ControlledTransaction<NewsletterDatabase>;

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const messageOf = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown database error';

/**
 * Writes the resolution inside the claim transaction. Terminal resolutions
 * lock the issue row before bumping its counter, then drop the task.
 */
async function writeResolution(
  trx: ClaimTransaction,
  task: DeliveryTask,
  resolution: TaskResolution
): Promise<void> {
  if (resolution.kind === 'retry') {
    await trx
      .updateTable('issue_delivery_queue')
      .set({ retry_count: resolution.retryCount, execute_after: resolution.executeAfter })
      .where('issue_id', '=', task.issueId)
      .where('subscriber_id', '=', task.subscriberId)
      .execute();
    return;
  }

  await trx
    .selectFrom('newsletter_issues')
    .select('issue_id')
    .where('issue_id', '=', task.issueId)
    .forUpdate()
    .executeTakeFirst();

  const counterUpdate =
    resolution.kind === 'delivered'
      ? trx
          .updateTable('newsletter_issues')
          .set((eb) => ({ delivered_count: eb('delivered_count', '+', 1) }))
      : trx
          .updateTable('newsletter_issues')
          .set((eb) => ({ failed_count: eb('failed_count', '+', 1) }));

  await counterUpdate.where('issue_id', '=', task.issueId).execute();

  await trx
    .deleteFrom('issue_delivery_queue')
    .where('issue_id', '=', task.issueId)
    .where('subscriber_id', '=', task.subscriberId)
    .execute();
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeDeliveryQueueRepo = (config: DeliveryQueueRepoConfig): DeliveryQueue => {
  const { db } = config;
  const log = config.logger.child({ repo: 'DeliveryQueueRepo' });

  const rollback = async (
    trx: ClaimTransaction,
    context: Record<string, unknown>
  ): Promise<Result<void, DeliveryError>> => {
    try {
      await trx.rollback().execute();
      return ok(undefined);
    } catch (error) {
      log.error({ ...context, err: error }, 'Failed to roll back delivery claim');
      return err(createDatabaseError(messageOf(error), error));
    }
  };

  const toClaim = (trx: ClaimTransaction, task: DeliveryTask): ClaimedTask => {
    const context = { issueId: task.issueId, subscriberId: task.subscriberId };

    return createClaimedTask({
      task,
      record: async (resolution) => {
        try {
          await writeResolution(trx, task, resolution);
          await trx.commit().execute();
          log.debug({ ...context, resolution: resolution.kind }, 'Delivery task resolved');
          return ok(undefined);
        } catch (error) {
          log.error({ ...context, err: error }, 'Failed to record delivery outcome');
          await rollback(trx, context);
          return err(createDatabaseError(messageOf(error), error));
        }
      },
      rollback: () => rollback(trx, context),
    });
  };

  return {
    async dequeueTask(): Promise<Result<ClaimedTask | null, DeliveryError>> {
      let trx: ClaimTransaction;
      try {
        trx = await db.startTransaction().execute();
      } catch (error) {
        log.error({ err: error }, 'Failed to open claim transaction');
        return err(createDatabaseError(messageOf(error), error));
      }

      try {
        const row = await trx
          .selectFrom('issue_delivery_queue')
          .select(['issue_id', 'subscriber_id', 'retry_count', 'execute_after'])
          .where('execute_after', '<=', sql<Date>`now()`)
          .orderBy('execute_after')
          .limit(1)
          .forUpdate()
          .skipLocked()
          .executeTakeFirst();

        if (row === undefined) {
          const released = await rollback(trx, {});
          return released.map(() => null);
        }

        return ok(
          toClaim(trx, {
            issueId: row.issue_id,
            subscriberId: row.subscriber_id,
            retryCount: row.retry_count,
            executeAfter: row.execute_after,
          })
        );
      } catch (error) {
        log.error({ err: error }, 'Failed to claim delivery task');
        await rollback(trx, {});
        return err(createDatabaseError(messageOf(error), error));
      }
    },

    async isEmpty(): Promise<Result<boolean, DeliveryError>> {
      try {
        const row = await db
          .selectFrom('issue_delivery_queue')
          .select((eb) => eb.fn.countAll<string>().as('count'))
          .executeTakeFirst();

        return ok(Number(row?.count ?? 0) === 0);
      } catch (error) {
        log.error({ err: error }, 'Failed to count delivery tasks');
        return err(createDatabaseError(messageOf(error), error));
      }
    },
  };
};
