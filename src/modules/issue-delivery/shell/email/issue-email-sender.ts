/**
 * Issue email sender backed by the shared Resend client.
 */

import { ok, err } from 'neverthrow';

import type { IssueEmailSender } from '../../core/ports.js';
import type { EmailSender } from '../../../../infra/email/client.js';

export interface MakeIssueEmailSenderDeps {
  emailSender: EmailSender;
}

export const makeIssueEmailSender = (deps: MakeIssueEmailSenderDeps): IssueEmailSender => ({
  async send(email) {
    const result = await deps.emailSender.send({
      to: email.to,
      subject: email.subject,
      html: email.html,
      text: email.text,
      idempotencyKey: email.idempotencyKey,
      tags: [{ name: 'category', value: 'newsletter_issue' }],
    });

    // Every transport error counts as transient
    return result.isOk()
      ? ok(undefined)
      : err({ message: `${result.error.type}: ${result.error.message}` });
  },
});
