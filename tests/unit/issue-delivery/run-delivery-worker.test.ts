import { describe, expect, it } from 'vitest';

import { createSilentLogger } from '@/infra/logger/index.js';
import { runDeliveryWorker } from '@/modules/issue-delivery/index.js';

import { createTestIssue, createTestTask } from '../../fixtures/builders.js';
import {
  addConfirmedSubscriber,
  createNewsletterStore,
  makeFakeContentReader,
  makeFakeDeliveryQueue,
  makeFakeIssueEmailSender,
  taskKey,
  type NewsletterStore,
} from '../../fixtures/fakes.js';

/**
 * A sleep that records durations and aborts the worker after `limit` calls.
 */
const makeStoppingSleep = (controller: AbortController, limit: number) => {
  const sleeps: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    sleeps.push(ms);
    if (sleeps.length >= limit) controller.abort();
  };
  return { sleep, sleeps };
};

const makeDeps = (store: NewsletterStore, options: { failDequeue?: boolean } = {}) => ({
  queue: makeFakeDeliveryQueue(store, options),
  contentReader: makeFakeContentReader(store),
  emailSender: makeFakeIssueEmailSender().sender,
  retryPolicy: { maxRetries: 3, retryDelayMs: 60_000 },
  baseUrl: 'https://newsletter.test',
  logger: createSilentLogger(),
  now: store.clock.now,
});

describe('runDeliveryWorker', () => {
  it('works through due tasks without sleeping, then waits on the empty queue', async () => {
    const store = createNewsletterStore();
    store.issues.set('issue-1', createTestIssue({ subscribersAtPublish: 2 }));
    addConfirmedSubscriber(store, { id: 'sub-1', email: 'ursula@example.com', name: 'Ursula' });
    addConfirmedSubscriber(store, { id: 'sub-2', email: 'octavia@example.com', name: 'Octavia' });
    store.queue.set(taskKey('issue-1', 'sub-1'), createTestTask());
    store.queue.set(taskKey('issue-1', 'sub-2'), createTestTask({ subscriberId: 'sub-2' }));

    const controller = new AbortController();
    const { sleep, sleeps } = makeStoppingSleep(controller, 1);

    const stats = await runDeliveryWorker(
      { ...makeDeps(store), sleep },
      { signal: controller.signal }
    );

    expect(stats).toEqual({ iterations: 3, tasksCompleted: 2, infrastructureErrors: 0 });
    expect(sleeps).toEqual([10_000]);
    expect(store.issues.get('issue-1')).toMatchObject({ deliveredCount: 2 });
  });

  it('backs off while tasks are postponed', async () => {
    const store = createNewsletterStore();
    store.queue.set(
      taskKey('issue-1', 'sub-1'),
      createTestTask({ executeAfter: new Date('2026-03-02T00:00:00.000Z') })
    );
    const controller = new AbortController();
    const { sleep, sleeps } = makeStoppingSleep(controller, 4);

    const stats = await runDeliveryWorker(
      { ...makeDeps(store), sleep },
      { signal: controller.signal }
    );

    expect(sleeps).toEqual([10, 100, 1_000, 10_000]);
    expect(stats.iterations).toBe(4);
    expect(stats.tasksCompleted).toBe(0);
  });

  it('keeps running after an infrastructure error', async () => {
    const store = createNewsletterStore();
    const controller = new AbortController();
    const { sleep, sleeps } = makeStoppingSleep(controller, 2);

    const stats = await runDeliveryWorker(
      { ...makeDeps(store, { failDequeue: true }), sleep },
      { signal: controller.signal }
    );

    expect(stats).toEqual({ iterations: 2, tasksCompleted: 0, infrastructureErrors: 2 });
    expect(sleeps).toEqual([1_000, 1_000]);
  });

  it('honours a custom backoff policy', async () => {
    const store = createNewsletterStore();
    const controller = new AbortController();
    const { sleep, sleeps } = makeStoppingSleep(controller, 1);

    await runDeliveryWorker(
      { ...makeDeps(store), sleep },
      {
        signal: controller.signal,
        backoff: { floorMs: 1, factor: 2, capMs: 8, emptyQueueMs: 250, errorMs: 50 },
      }
    );

    expect(sleeps).toEqual([250]);
  });
});
