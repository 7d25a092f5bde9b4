import { describe, expect, it } from 'vitest';

import { confirmSubscription, unsubscribe } from '@/modules/subscriptions/index.js';

import { createTestTask } from '../../fixtures/builders.js';
import {
  createNewsletterStore,
  makeFakeSubscriptionsRepo,
  taskKey,
  type NewsletterStore,
} from '../../fixtures/fakes.js';

const TOKEN = 'abcdefghijklmnopqrstuvwxy';
const UNKNOWN_TOKEN = 'ABCDEFGHIJKLMNOPQRSTUVWXY';

const seedPending = (): NewsletterStore => {
  const store = createNewsletterStore();
  store.subscriptions.set('sub-1', {
    id: 'sub-1',
    email: 'ursula@example.com',
    name: 'Ursula Le Guin',
    status: 'pending_confirmation',
    subscribedAt: store.clock.now(),
  });
  store.tokens.set(TOKEN, 'sub-1');
  return store;
};

describe('confirmSubscription', () => {
  it('confirms a pending subscription', async () => {
    const store = seedPending();
    const deps = { subscriptionsRepo: makeFakeSubscriptionsRepo(store) };

    const result = await confirmSubscription(deps, TOKEN);

    expect(result._unsafeUnwrap()).toEqual({
      subscriberId: 'sub-1',
      email: 'ursula@example.com',
      name: 'Ursula Le Guin',
      newlyConfirmed: true,
    });
    expect(store.subscriptions.get('sub-1')?.status).toBe('confirmed');
  });

  it('is a no-op the second time', async () => {
    const store = seedPending();
    const deps = { subscriptionsRepo: makeFakeSubscriptionsRepo(store) };
    await confirmSubscription(deps, TOKEN);

    const again = await confirmSubscription(deps, TOKEN);

    expect(again._unsafeUnwrap().newlyConfirmed).toBe(false);
    expect(store.subscriptions.get('sub-1')?.status).toBe('confirmed');
  });

  it('rejects a malformed token before any lookup', async () => {
    const deps = { subscriptionsRepo: makeFakeSubscriptionsRepo(seedPending(), { simulateDbError: true }) };

    const error = (await confirmSubscription(deps, 'short'))._unsafeUnwrapErr();

    expect(error.type).toBe('InvalidSubscriptionTokenError');
  });

  it('rejects a token that matches nothing', async () => {
    const deps = { subscriptionsRepo: makeFakeSubscriptionsRepo(seedPending()) };

    const error = (await confirmSubscription(deps, UNKNOWN_TOKEN))._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'UnknownSubscriptionTokenError',
      message: 'The subscription token does not match any subscription.',
    });
  });
});

describe('unsubscribe', () => {
  it('removes the subscription and its token but leaves queued deliveries', async () => {
    const store = seedPending();
    store.queue.set(taskKey('issue-1', 'sub-1'), createTestTask());
    store.queue.set(taskKey('issue-1', 'sub-2'), createTestTask({ subscriberId: 'sub-2' }));
    const deps = { subscriptionsRepo: makeFakeSubscriptionsRepo(store) };

    const result = await unsubscribe(deps, TOKEN);

    expect(result._unsafeUnwrap()).toEqual({ email: 'ursula@example.com', name: 'Ursula Le Guin' });
    expect(store.subscriptions.has('sub-1')).toBe(false);
    expect(store.tokens.has(TOKEN)).toBe(false);
    expect([...store.queue.keys()]).toEqual([
      taskKey('issue-1', 'sub-1'),
      taskKey('issue-1', 'sub-2'),
    ]);
  });

  it('rejects the token once the subscription is gone', async () => {
    const store = seedPending();
    const deps = { subscriptionsRepo: makeFakeSubscriptionsRepo(store) };
    await unsubscribe(deps, TOKEN);

    const error = (await unsubscribe(deps, TOKEN))._unsafeUnwrapErr();

    expect(error.type).toBe('UnknownSubscriptionTokenError');
  });

  it('passes database errors through', async () => {
    const deps = { subscriptionsRepo: makeFakeSubscriptionsRepo(seedPending(), { simulateDbError: true }) };

    expect((await unsubscribe(deps, TOKEN))._unsafeUnwrapErr().type).toBe('DatabaseError');
  });
});
