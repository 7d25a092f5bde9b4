/**
 * Unsubscribe Use Case
 *
 * Removes a subscription identified by its token. Pending deliveries to the
 * subscriber go with it.
 */

import { ok, err, type Result } from 'neverthrow';

import { createUnknownSubscriptionTokenError, type SubscriptionError } from '../errors.js';
import { parseSubscriptionToken } from '../token.js';

import type { SubscriptionsRepository } from '../ports.js';
import type { SubscriberDetails } from '../types.js';

export interface UnsubscribeDeps {
  subscriptionsRepo: SubscriptionsRepository;
}

export async function unsubscribe(
  deps: UnsubscribeDeps,
  rawToken: string
): Promise<Result<SubscriberDetails, SubscriptionError>> {
  const { subscriptionsRepo } = deps;

  const tokenResult = parseSubscriptionToken(rawToken);
  if (tokenResult.isErr()) {
    return err(tokenResult.error);
  }

  const idResult = await subscriptionsRepo.findSubscriberIdByToken(tokenResult.value);
  if (idResult.isErr()) {
    return err(idResult.error);
  }
  const subscriberId = idResult.value;
  if (subscriberId === null) {
    return err(createUnknownSubscriptionTokenError());
  }

  const subscriptionResult = await subscriptionsRepo.findById(subscriberId);
  if (subscriptionResult.isErr()) {
    return err(subscriptionResult.error);
  }
  const subscription = subscriptionResult.value;
  if (subscription === null) {
    return err(createUnknownSubscriptionTokenError());
  }

  const removeResult = await subscriptionsRepo.remove(subscriberId);
  if (removeResult.isErr()) {
    return err(removeResult.error);
  }

  return ok({ email: subscription.email, name: subscription.name });
}
