/**
 * Subscription links and the confirmation email content.
 */

import type { NewSubscriber } from './subscriber.js';
import type { ConfirmationEmail } from './types.js';

export const buildConfirmationLink = (baseUrl: string, token: string): string =>
  `${baseUrl}/subscriptions/confirm?subscription_token=${encodeURIComponent(token)}`;

export const buildUnsubscribeLink = (baseUrl: string, token: string): string =>
  `${baseUrl}/subscriptions/unsubscribe?subscription_token=${encodeURIComponent(token)}`;

export function buildConfirmationEmail(
  subscriber: NewSubscriber,
  confirmationLink: string
): ConfirmationEmail {
  return {
    to: subscriber.email,
    subject: 'Welcome!',
    html:
      `Welcome to our newsletter, ${escapeHtml(subscriber.name)}!<br />` +
      `Click <a href="${escapeHtml(confirmationLink)}">here</a> to confirm your subscription.`,
    text: `Welcome to our newsletter, ${subscriber.name}!\nVisit ${confirmationLink} to confirm your subscription.`,
  };
}

export const escapeHtml = (value: string): string =>
  value
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#39;');
