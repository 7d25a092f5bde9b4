import { describe, expect, it } from 'vitest';

import { createSilentLogger } from '@/infra/logger/index.js';
import { createIdempotencyInProgressError } from '@/modules/idempotency/index.js';
import {
  ISSUE_ACCEPTED_MESSAGE,
  publishIssue,
  renderAcceptedResponse,
  type PublishIssueInput,
} from '@/modules/newsletter-issues/index.js';

import { TEST_IDEMPOTENCY_KEY } from '../../fixtures/builders.js';
import {
  addConfirmedSubscriber,
  createNewsletterStore,
  fakeIssueId,
  makeFakeIdempotencyRepo,
  taskKey,
  type FakeIdempotencyRepo,
  type NewsletterStore,
} from '../../fixtures/fakes.js';

const seedStore = (): NewsletterStore => {
  const store = createNewsletterStore();
  addConfirmedSubscriber(store, { id: 'sub-1', email: 'ursula@example.com', name: 'Ursula' });
  addConfirmedSubscriber(store, { id: 'sub-2', email: 'octavia@example.com', name: 'Octavia' });
  store.subscriptions.set('sub-3', {
    id: 'sub-3',
    email: 'pending@example.com',
    name: 'Pending',
    status: 'pending_confirmation',
    subscribedAt: store.clock.now(),
  });
  return store;
};

const input = (overrides: Partial<PublishIssueInput> = {}): PublishIssueInput => ({
  userId: 'user-1',
  idempotencyKey: TEST_IDEMPOTENCY_KEY,
  title: 'Spring issue',
  htmlContent: '<p>Hello</p>',
  textContent: 'Hello',
  renderResponse: renderAcceptedResponse,
  ...overrides,
});

const publish = (repo: FakeIdempotencyRepo, overrides: Partial<PublishIssueInput> = {}) =>
  publishIssue({ idempotencyRepo: repo, logger: createSilentLogger() }, input(overrides));

const acceptedBody = (issueId: string, subscribersAtPublish: number): string =>
  JSON.stringify({
    ok: true,
    data: { issueId, subscribersAtPublish, message: ISSUE_ACCEPTED_MESSAGE },
  });

describe('publishIssue', () => {
  it('creates the issue and one task per confirmed subscriber', async () => {
    const store = seedStore();
    const repo = makeFakeIdempotencyRepo(store);

    const result = (await publish(repo))._unsafeUnwrap();

    expect(result.replayed).toBe(false);
    expect(result.response).toEqual({
      statusCode: 202,
      headers: [{ name: 'content-type', value: 'application/json; charset=utf-8' }],
      body: acceptedBody(fakeIssueId(1), 2),
    });
    expect(store.issues.get(fakeIssueId(1))).toMatchObject({
      title: 'Spring issue',
      subscribersAtPublish: 2,
      deliveredCount: 0,
      failedCount: 0,
    });
    expect([...store.queue.keys()].sort()).toEqual([
      taskKey(fakeIssueId(1), 'sub-1'),
      taskKey(fakeIssueId(1), 'sub-2'),
    ]);
    expect(repo.held.size).toBe(0);
  });

  it('replays the stored response for a repeated key, whatever the body', async () => {
    const store = seedStore();
    const repo = makeFakeIdempotencyRepo(store);
    const first = (await publish(repo))._unsafeUnwrap();

    const second = (await publish(repo, { title: 'A different title' }))._unsafeUnwrap();

    expect(second.replayed).toBe(true);
    expect(second.response).toEqual(first.response);
    expect(store.issues.size).toBe(1);
    expect(store.queue.size).toBe(2);
  });

  it('treats the same key as new for another user', async () => {
    const store = seedStore();
    const repo = makeFakeIdempotencyRepo(store);
    await publish(repo);

    const other = (await publish(repo, { userId: 'user-2' }))._unsafeUnwrap();

    expect(other.replayed).toBe(false);
    expect(other.response.body).toBe(acceptedBody(fakeIssueId(2), 2));
    expect(store.issues.size).toBe(2);
  });

  it('lets concurrent requests with one key publish once', async () => {
    const store = seedStore();
    const repo = makeFakeIdempotencyRepo(store);

    const [a, b] = await Promise.all([publish(repo), publish(repo)]);

    const results = [a._unsafeUnwrap(), b._unsafeUnwrap()];
    expect(results.map((r) => r.replayed).sort()).toEqual([false, true]);
    expect(results[0]?.response).toEqual(results[1]?.response);
    expect(store.issues.size).toBe(1);
    expect(store.queue.size).toBe(2);
  });

  it('rejects a key that is not a UUID without touching storage', async () => {
    const store = seedStore();
    const repo = makeFakeIdempotencyRepo(store);

    const error = (await publish(repo, { idempotencyKey: 'not-a-uuid' }))._unsafeUnwrapErr();

    expect(error.type).toBe('InvalidIdempotencyKeyError');
    expect(store.issues.size).toBe(0);
    expect(store.idempotency.size).toBe(0);
    expect(repo.held.size).toBe(0);
  });

  it('validates the content before the key', async () => {
    const repo = makeFakeIdempotencyRepo(seedStore());

    const error = (await publish(repo, { title: ' ', idempotencyKey: 'not-a-uuid' }))._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'IssueValidationError',
      field: 'title',
      message: 'You must set a title for your newsletter.',
    });
  });

  it('rolls everything back when queueing fails, leaving the key reusable', async () => {
    const store = seedStore();
    const failing = makeFakeIdempotencyRepo(store, { failOn: 'enqueueIssue' });

    const error = (await publish(failing))._unsafeUnwrapErr();

    expect(error).toEqual({ type: 'DatabaseError', message: 'Simulated database error', cause: undefined });
    expect(store.issues.size).toBe(0);
    expect(store.idempotency.size).toBe(0);
    expect(failing.held.size).toBe(0);

    const retried = (await publish(makeFakeIdempotencyRepo(store)))._unsafeUnwrap();
    expect(retried.replayed).toBe(false);
    expect(store.queue.size).toBe(2);
  });

  it('rolls back when the subscriber snapshot fails', async () => {
    const store = seedStore();
    const repo = makeFakeIdempotencyRepo(store, { failOn: 'listConfirmedSubscriberIds' });

    expect((await publish(repo))._unsafeUnwrapErr().type).toBe('DatabaseError');
    expect(repo.held.size).toBe(0);
  });

  it('drops the staged writes when saving the response fails', async () => {
    const store = seedStore();
    const repo = makeFakeIdempotencyRepo(store, { failPersist: true });

    const error = (await publish(repo))._unsafeUnwrapErr();

    expect(error.message).toBe('Simulated commit failure');
    expect(store.issues.size).toBe(0);
    expect(store.queue.size).toBe(0);
    expect(repo.held.size).toBe(0);
  });

  it('accepts an issue with no confirmed subscribers', async () => {
    const store = createNewsletterStore();
    const repo = makeFakeIdempotencyRepo(store);

    const result = (await publish(repo))._unsafeUnwrap();

    expect(result.response.body).toBe(acceptedBody(fakeIssueId(1), 0));
    expect(store.issues.get(fakeIssueId(1))?.subscribersAtPublish).toBe(0);
    expect(store.queue.size).toBe(0);
  });

  it('passes an in-progress conflict through', async () => {
    const repo = makeFakeIdempotencyRepo(seedStore(), {
      tryProcessingError: createIdempotencyInProgressError(),
    });

    expect((await publish(repo))._unsafeUnwrapErr().type).toBe('IdempotencyInProgressError');
  });
});
