/**
 * Subscriptions Module - Domain Types
 */

import type { SubscriberEmail } from './subscriber.js';

export type SubscriptionStatus = 'pending_confirmation' | 'confirmed';

export interface Subscription {
  readonly id: string;
  readonly email: string;
  readonly name: string;
  readonly status: SubscriptionStatus;
  readonly subscribedAt: Date;
}

export interface PendingSubscription {
  readonly subscriberId: string;
  readonly token: string;
  /** False when the email was already subscribed and its token was reused */
  readonly created: boolean;
}

export interface ConfirmationEmail {
  readonly to: SubscriberEmail;
  readonly subject: string;
  readonly html: string;
  readonly text: string;
}

export interface SubscriberDetails {
  readonly email: string;
  readonly name: string;
}

/** Confirmation tokens are this many ASCII letters and digits */
export const SUBSCRIPTION_TOKEN_LENGTH = 25;
