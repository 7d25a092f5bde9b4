/**
 * Subscriptions Module - Ports
 */

import type { SubscriptionError } from './errors.js';
import type { NewSubscriber } from './subscriber.js';
import type { ConfirmationEmail, PendingSubscription, Subscription } from './types.js';
import type { Result } from 'neverthrow';

export interface SubscriptionsRepository {
  /**
   * Stores a pending subscription with its token in one transaction. When
   * the email is already subscribed, returns the stored token instead.
   */
  createPending(
    subscriber: NewSubscriber,
    token: string
  ): Promise<Result<PendingSubscription, SubscriptionError>>;

  findSubscriberIdByToken(token: string): Promise<Result<string | null, SubscriptionError>>;

  findById(subscriberId: string): Promise<Result<Subscription | null, SubscriptionError>>;

  /** Marks a pending subscription confirmed. Returns false if it already was. */
  confirm(subscriberId: string): Promise<Result<boolean, SubscriptionError>>;

  /** Deletes the subscription, its token and its pending deliveries. */
  remove(subscriberId: string): Promise<Result<void, SubscriptionError>>;
}

export interface TokenGenerator {
  generate(): string;
}

export interface ConfirmationEmailSender {
  send(email: ConfirmationEmail): Promise<Result<unknown, { message: string }>>;
}
