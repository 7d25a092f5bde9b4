/**
 * Confirm Subscription Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { createUnknownSubscriptionTokenError, type SubscriptionError } from '../errors.js';
import { parseSubscriptionToken } from '../token.js';

import type { SubscriptionsRepository } from '../ports.js';
import type { SubscriberDetails } from '../types.js';

export interface ConfirmSubscriptionDeps {
  subscriptionsRepo: SubscriptionsRepository;
}

export interface ConfirmedSubscription extends SubscriberDetails {
  readonly subscriberId: string;
  /** False when the subscription had been confirmed before */
  readonly newlyConfirmed: boolean;
}

/**
 * Confirms the subscription the token belongs to.
 */
export async function confirmSubscription(
  deps: ConfirmSubscriptionDeps,
  rawToken: string
): Promise<Result<ConfirmedSubscription, SubscriptionError>> {
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
  // Token outlived its subscription
  if (subscription === null) {
    return err(createUnknownSubscriptionTokenError());
  }

  const confirmResult = await subscriptionsRepo.confirm(subscriberId);
  if (confirmResult.isErr()) {
    return err(confirmResult.error);
  }

  return ok({
    subscriberId,
    email: subscription.email,
    name: subscription.name,
    newlyConfirmed: confirmResult.value,
  });
}
