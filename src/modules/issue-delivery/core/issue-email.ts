/**
 * Per-subscriber issue email: the stored issue body with an unsubscribe
 * footer carrying the subscriber's own token.
 */

import {
  buildUnsubscribeLink,
  escapeHtml,
} from '../../subscriptions/core/confirmation-email.js';

import type { IssueEmail } from './ports.js';
import type { IssueContent } from './types.js';

export interface IssueRecipient {
  readonly subscriberId: string;
  readonly email: string;
  readonly subscriptionToken: string;
}

export function buildIssueEmail(
  issue: IssueContent,
  recipient: IssueRecipient,
  baseUrl: string
): IssueEmail {
  const unsubscribeLink = buildUnsubscribeLink(baseUrl, recipient.subscriptionToken);

  return {
    to: recipient.email,
    subject: issue.title,
    html:
      `${issue.htmlContent}\n<hr />\n` +
      `<p>No longer interested? <a href="${escapeHtml(unsubscribeLink)}">Unsubscribe</a>.</p>`,
    text: `${issue.textContent}\n\n--\nNo longer interested? Unsubscribe: ${unsubscribeLink}`,
    idempotencyKey: `${issue.issueId}-${recipient.subscriberId}`,
  };
}
