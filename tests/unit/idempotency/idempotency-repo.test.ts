import { describe, expect, it } from 'vitest';

import { createSilentLogger } from '@/infra/logger/index.js';
import { makeIdempotencyRepo, parseIdempotencyKey } from '@/modules/idempotency/index.js';

import { TEST_IDEMPOTENCY_KEY } from '../../fixtures/builders.js';
import { createScriptedDb, type Responder } from '../../fixtures/scripted-db.js';

const key = parseIdempotencyKey(TEST_IDEMPOTENCY_KEY)._unsafeUnwrap();

const savedRow = {
  response_status: 202,
  response_headers: [{ name: 'content-type', value: 'application/json' }],
  response_body: '{"ok":true}',
};

const setup = (respond: Responder) => {
  const scripted = createScriptedDb(respond);
  const repo = makeIdempotencyRepo({
    db: scripted.db,
    logger: createSilentLogger(),
    bindScope: () => ({ bound: true }),
  });
  return { ...scripted, repo };
};

const isInsert = (sql: string): boolean => sql.startsWith('insert into "idempotency"');
const isSelect = (sql: string): boolean => sql.startsWith('select');

describe('makeIdempotencyRepo', () => {
  describe('tryProcessing', () => {
    it('claims a fresh key and commits the response on complete', async () => {
      const { repo, statements, queries } = setup((q) =>
        isInsert(q.sql) ? { numAffectedRows: 1n } : undefined
      );

      const next = (await repo.tryProcessing('user-1', key))._unsafeUnwrap();
      if (next.action !== 'StartProcessing') {
        throw new Error(`Expected StartProcessing, got ${next.action}`);
      }
      expect(next.handle.scope).toEqual({ bound: true });

      const saved = await next.handle.complete({
        statusCode: 202,
        headers: [{ name: 'content-type', value: 'application/json' }],
        body: '{"ok":true}',
      });

      expect(saved.isOk()).toBe(true);
      const sql = statements();
      expect(sql[0]).toBe('begin');
      expect(sql[1]).toContain('on conflict ("user_id", "idempotency_key") do nothing');
      expect(sql[2]).toContain('update "idempotency" set');
      expect(sql[3]).toBe('commit');
      expect(sql).toHaveLength(4);
      expect(queries[2]?.parameters).toEqual([
        202,
        '[{"name":"content-type","value":"application/json"}]',
        '{"ok":true}',
        'user-1',
        TEST_IDEMPOTENCY_KEY,
      ]);
    });

    it('rolls the claim back on abort', async () => {
      const { repo, statements } = setup((q) =>
        isInsert(q.sql) ? { numAffectedRows: 1n } : undefined
      );

      const next = (await repo.tryProcessing('user-1', key))._unsafeUnwrap();
      if (next.action !== 'StartProcessing') {
        throw new Error(`Expected StartProcessing, got ${next.action}`);
      }
      await next.handle.abort();

      expect(statements()).toHaveLength(3);
      expect(statements()[2]).toBe('rollback');
    });

    it('returns the saved response when the key was already used', async () => {
      const { repo, statements } = setup((q) => {
        if (isInsert(q.sql)) return { numAffectedRows: 0n };
        if (isSelect(q.sql)) return { rows: [savedRow] };
        return undefined;
      });

      const next = (await repo.tryProcessing('user-1', key))._unsafeUnwrap();

      expect(next).toEqual({
        action: 'ReturnSavedResponse',
        response: {
          statusCode: 202,
          headers: [{ name: 'content-type', value: 'application/json' }],
          body: '{"ok":true}',
        },
      });
      expect(statements()[0]).toBe('begin');
      expect(statements()[2]).toContain('from "idempotency"');
      expect(statements()[3]).toBe('rollback');
    });

    it('reports a record without a response as in progress', async () => {
      const { repo, statements } = setup((q) => {
        if (isInsert(q.sql)) return { numAffectedRows: 0n };
        if (isSelect(q.sql)) {
          return {
            rows: [{ response_status: null, response_headers: null, response_body: null }],
          };
        }
        return undefined;
      });

      const error = (await repo.tryProcessing('user-1', key))._unsafeUnwrapErr();

      expect(error.type).toBe('IdempotencyInProgressError');
      expect(statements()[3]).toBe('rollback');
    });

    it('rejects stored headers of the wrong shape', async () => {
      const { repo } = setup((q) => {
        if (isInsert(q.sql)) return { numAffectedRows: 0n };
        if (isSelect(q.sql)) return { rows: [{ ...savedRow, response_headers: { bad: true } }] };
        return undefined;
      });

      const error = (await repo.tryProcessing('user-1', key))._unsafeUnwrapErr();

      expect(error).toEqual({
        type: 'DatabaseError',
        message: 'Stored response headers are malformed',
        cause: undefined,
      });
    });

    it('maps a failing insert to a database error and rolls back', async () => {
      const { repo, statements } = setup((q) =>
        isInsert(q.sql) ? new Error('deadlock detected') : undefined
      );

      const error = (await repo.tryProcessing('user-1', key))._unsafeUnwrapErr();

      expect(error.type).toBe('DatabaseError');
      expect(error.message).toBe('deadlock detected');
      expect(statements()).toEqual(['begin', expect.stringContaining('insert into'), 'rollback']);
    });
  });

  describe('deleteOlderThan', () => {
    it('deletes by age and returns the count', async () => {
      const { repo, queries } = setup(() => ({ numAffectedRows: 3n }));

      const deleted = await repo.deleteOlderThan(60);

      expect(deleted._unsafeUnwrap()).toBe(3);
      expect(queries[0]?.sql).toContain('make_interval(mins => $1)');
      expect(queries[0]?.parameters).toEqual([60]);
    });

    it('maps a query failure to a database error', async () => {
      const { repo } = setup(() => new Error('relation does not exist'));

      const error = (await repo.deleteOlderThan(60))._unsafeUnwrapErr();

      expect(error.message).toBe('relation does not exist');
    });
  });
});
