import { err, ok, type Result } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import {
  createIdempotencyDatabaseError,
  createProcessingHandle,
  parseIdempotencyKey,
  saveResponse,
  type IdempotencyError,
  type SavedResponse,
} from '@/modules/idempotency/index.js';

import { TEST_IDEMPOTENCY_KEY } from '../../fixtures/builders.js';

const key = parseIdempotencyKey(TEST_IDEMPOTENCY_KEY)._unsafeUnwrap();

const response: SavedResponse = {
  statusCode: 202,
  headers: [{ name: 'content-type', value: 'application/json' }],
  body: '{"ok":true}',
};

const makeHandle = (persistFails = false) => {
  const persist = vi.fn(
    async (_response: SavedResponse): Promise<Result<void, IdempotencyError>> =>
      persistFails ? err(createIdempotencyDatabaseError('commit failed')) : ok(undefined)
  );
  const discard = vi.fn(async (): Promise<Result<void, IdempotencyError>> => ok(undefined));
  const handle = createProcessingHandle({
    userId: 'user-1',
    key,
    scope: { tag: 'scope' },
    persist,
    discard,
  });
  return { handle, persist, discard };
};

describe('createProcessingHandle', () => {
  it('starts open and exposes the scope', () => {
    const { handle } = makeHandle();

    expect(handle.state).toBe('open');
    expect(handle.scope).toEqual({ tag: 'scope' });
    expect(handle.userId).toBe('user-1');
  });

  it('persists the response once on complete', async () => {
    const { handle, persist, discard } = makeHandle();

    const result = await handle.complete(response);

    expect(result._unsafeUnwrap()).toEqual(response);
    expect(handle.state).toBe('completed');
    expect(persist).toHaveBeenCalledTimes(1);
    expect(persist).toHaveBeenCalledWith(response);
    expect(discard).not.toHaveBeenCalled();
  });

  it('refuses a second complete', async () => {
    const { handle, persist } = makeHandle();
    await handle.complete(response);

    const second = await handle.complete(response);

    expect(second._unsafeUnwrapErr()).toEqual({
      type: 'TransactionClosedError',
      message: 'Idempotent processing was already completed',
    });
    expect(persist).toHaveBeenCalledTimes(1);
  });

  it('discards on abort and refuses anything afterwards', async () => {
    const { handle, persist, discard } = makeHandle();

    expect((await handle.abort()).isOk()).toBe(true);
    expect(handle.state).toBe('aborted');

    const completed = await handle.complete(response);
    const abortedAgain = await handle.abort();

    expect(completed._unsafeUnwrapErr().message).toBe('Idempotent processing was already aborted');
    expect(abortedAgain._unsafeUnwrapErr().type).toBe('TransactionClosedError');
    expect(persist).not.toHaveBeenCalled();
    expect(discard).toHaveBeenCalledTimes(1);
  });

  it('discards and reports the persist error when saving fails', async () => {
    const { handle, discard } = makeHandle(true);

    const result = await handle.complete(response);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'DatabaseError',
      message: 'commit failed',
      cause: undefined,
    });
    expect(handle.state).toBe('aborted');
    expect(discard).toHaveBeenCalledTimes(1);
  });
});

describe('saveResponse', () => {
  it('completes an open handle', async () => {
    const { handle, persist } = makeHandle();

    const result = await saveResponse(handle, response);

    expect(result._unsafeUnwrap()).toEqual(response);
    expect(persist).toHaveBeenCalledTimes(1);
  });

  it('fails on a handle that was already aborted', async () => {
    const { handle, persist } = makeHandle();
    await handle.abort();

    const result = await saveResponse(handle, response);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'TransactionClosedError',
      message: 'Idempotent processing was already aborted',
    });
    expect(persist).not.toHaveBeenCalled();
  });
});
