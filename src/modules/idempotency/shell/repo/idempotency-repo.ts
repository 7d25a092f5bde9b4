/**
 * Idempotency Repository Implementation
 *
 * Kysely/PostgreSQL. `tryProcessing` opens a controlled transaction and
 * inserts the in-progress record with ON CONFLICT DO NOTHING. A concurrent
 * request inserting the same key blocks on the primary key until this
 * transaction ends, so by the time it sees the conflict the stored response
 * is committed.
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { sql, type ControlledTransaction, type Kysely, type Transaction } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import {
  createDatabaseError,
  createIdempotencyInProgressError,
  type IdempotencyError,
} from '../../core/errors.js';
import { createProcessingHandle } from '../../core/processing-handle.js';

import type { IdempotencyRepository, ProcessingHandle } from '../../core/ports.js';
import type { IdempotencyKey, NextAction, SavedResponse } from '../../core/types.js';
import type { NewsletterDatabase } from '../../../../infra/database/types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface IdempotencyRepoConfig<TScope> {
  db: Kysely<NewsletterDatabase>;
  logger: Logger;
  /** Builds the caller's transactional scope on top of the claim transaction */
  bindScope: (trx: Transaction<NewsletterDatabase>) => TScope;
}

const StoredHeadersSchema = Type.Array(Type.Object({ name: Type.String(), value: Type.String() }));

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const messageOf = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown database error';

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeIdempotencyRepo = <TScope>(
  config: IdempotencyRepoConfig<TScope>
): IdempotencyRepository<TScope> => {
  const { db, bindScope } = config;
  const log = config.logger.child({ repo: 'IdempotencyRepo' });

  const rollback = async (
    trx: ControlledTransaction<NewsletterDatabase>,
    context: Record<string, unknown>
  ): Promise<Result<void, IdempotencyError>> => {
    try {
      await trx.rollback().execute();
      return ok(undefined);
    } catch (error) {
      log.error({ ...context, err: error }, 'Failed to roll back idempotency transaction');
      return err(createDatabaseError(messageOf(error), error));
    }
  };

  const readSavedResponse = async (
    trx: ControlledTransaction<NewsletterDatabase>,
    userId: string,
    key: IdempotencyKey
  ): Promise<Result<SavedResponse, IdempotencyError>> => {
    const row = await trx
      .selectFrom('idempotency')
      .select(['response_status', 'response_headers', 'response_body'])
      .where('user_id', '=', userId)
      .where('idempotency_key', '=', key)
      .executeTakeFirst();

    if (row === undefined) {
      return err(createDatabaseError('Idempotency record disappeared after insert conflict'));
    }
    if (row.response_status === null || row.response_body === null) {
      return err(createIdempotencyInProgressError());
    }
    if (!Value.Check(StoredHeadersSchema, row.response_headers)) {
      return err(createDatabaseError('Stored response headers are malformed'));
    }

    return ok({
      statusCode: row.response_status,
      headers: row.response_headers,
      body: row.response_body,
    });
  };

  return {
    async tryProcessing(
      userId: string,
      key: IdempotencyKey
    ): Promise<Result<NextAction<ProcessingHandle<TScope>>, IdempotencyError>> {
      const context = { userId, idempotencyKey: key };
      let trx: ControlledTransaction<NewsletterDatabase>;

      try {
        trx = await db.startTransaction().execute();
      } catch (error) {
        log.error({ ...context, err: error }, 'Failed to open idempotency transaction');
        return err(createDatabaseError(messageOf(error), error));
      }

      try {
        const inserted = await trx
          .insertInto('idempotency')
          .values({
            user_id: userId,
            idempotency_key: key,
            response_status: null,
            response_headers: null,
            response_body: null,
          })
          .onConflict((oc) => oc.columns(['user_id', 'idempotency_key']).doNothing())
          .executeTakeFirst();

        if ((inserted.numInsertedOrUpdatedRows ?? 0n) > 0n) {
          log.debug(context, 'Idempotency key claimed');
          const claimTrx = trx;

          const handle = createProcessingHandle<TScope>({
            userId,
            key,
            scope: bindScope(claimTrx),
            persist: async (response) => {
              try {
                await claimTrx
                  .updateTable('idempotency')
                  .set({
                    response_status: response.statusCode,
                    response_headers: JSON.stringify(response.headers),
                    response_body: response.body,
                  })
                  .where('user_id', '=', userId)
                  .where('idempotency_key', '=', key)
                  .execute();
                await claimTrx.commit().execute();
                log.info({ ...context, statusCode: response.statusCode }, 'Saved idempotent response');
                return ok(undefined);
              } catch (error) {
                log.error({ ...context, err: error }, 'Failed to save idempotent response');
                return err(createDatabaseError(messageOf(error), error));
              }
            },
            discard: () => rollback(claimTrx, context),
          });

          return ok({ action: 'StartProcessing', handle });
        }

        const saved = await readSavedResponse(trx, userId, key);
        const released = await rollback(trx, context);
        if (saved.isErr()) {
          log.warn({ ...context, errorType: saved.error.type }, 'No saved response for key');
          return err(saved.error);
        }
        if (released.isErr()) {
          return err(released.error);
        }

        log.info(context, 'Returning saved response');
        return ok({ action: 'ReturnSavedResponse', response: saved.value });
      } catch (error) {
        log.error({ ...context, err: error }, 'Idempotency check failed');
        await rollback(trx, context);
        return err(createDatabaseError(messageOf(error), error));
      }
    },

    async deleteOlderThan(lifetimeMinutes: number): Promise<Result<number, IdempotencyError>> {
      try {
        const result = await db
          .deleteFrom('idempotency')
          .where('created_at', '<', sql<Date>`now() - make_interval(mins => ${lifetimeMinutes})`)
          .executeTakeFirst();

        return ok(Number(result.numDeletedRows));
      } catch (error) {
        log.error({ err: error, lifetimeMinutes }, 'Failed to delete expired idempotency keys');
        return err(createDatabaseError(messageOf(error), error));
      }
    },
  };
};
