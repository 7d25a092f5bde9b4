/**
 * Subscribe Use Case
 *
 * Registers a pending subscription and mails the confirmation link.
 */

import { ok, err, type Result } from 'neverthrow';

import { buildConfirmationEmail, buildConfirmationLink } from '../confirmation-email.js';
import { createConfirmationEmailError, type SubscriptionError } from '../errors.js';
import { parseNewSubscriber } from '../subscriber.js';

import type {
  ConfirmationEmailSender,
  SubscriptionsRepository,
  TokenGenerator,
} from '../ports.js';
import type { PendingSubscription } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Dependencies
// ─────────────────────────────────────────────────────────────────────────────

export interface SubscribeDeps {
  subscriptionsRepo: SubscriptionsRepository;
  tokenGenerator: TokenGenerator;
  emailSender: ConfirmationEmailSender;
  /** Public base URL, without a trailing slash */
  baseUrl: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Input
// ─────────────────────────────────────────────────────────────────────────────

export interface SubscribeInput {
  name: string;
  email: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Subscribes a reader.
 *
 * - Parses the name and email
 * - Stores the subscription as pending with a fresh token, or reuses the
 *   token of an existing subscription for the same email
 * - Sends the confirmation email
 */
export async function subscribe(
  deps: SubscribeDeps,
  input: SubscribeInput
): Promise<Result<PendingSubscription, SubscriptionError>> {
  const { subscriptionsRepo, tokenGenerator, emailSender, baseUrl } = deps;

  const parsed = parseNewSubscriber(input);
  if (parsed.isErr()) {
    return err(parsed.error);
  }
  const subscriber = parsed.value;

  const pendingResult = await subscriptionsRepo.createPending(
    subscriber,
    tokenGenerator.generate()
  );
  if (pendingResult.isErr()) {
    return err(pendingResult.error);
  }
  const pending = pendingResult.value;

  const email = buildConfirmationEmail(subscriber, buildConfirmationLink(baseUrl, pending.token));
  const sendResult = await emailSender.send(email);
  if (sendResult.isErr()) {
    return err(
      createConfirmationEmailError(`Failed to send confirmation email: ${sendResult.error.message}`)
    );
  }

  return ok(pending);
}
