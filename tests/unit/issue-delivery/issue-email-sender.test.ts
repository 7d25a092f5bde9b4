import { err, ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { makeIssueEmailSender } from '@/modules/issue-delivery/index.js';

import type { EmailError, EmailSender, SendEmailParams } from '@/infra/email/client.js';

const email = {
  to: 'ursula@example.com',
  subject: 'Spring issue',
  html: '<p>Hello</p>',
  text: 'Hello',
  idempotencyKey: 'issue-1-sub-1',
};

describe('makeIssueEmailSender', () => {
  it('forwards the message with its idempotency key and category tag', async () => {
    const calls: SendEmailParams[] = [];
    const transport: EmailSender = {
      async send(params) {
        calls.push(params);
        return ok({ emailId: 'email-1' });
      },
    };

    const result = await makeIssueEmailSender({ emailSender: transport }).send(email);

    expect(result.isOk()).toBe(true);
    expect(calls).toEqual([
      { ...email, tags: [{ name: 'category', value: 'newsletter_issue' }] },
    ]);
  });

  it('flattens transport errors into a message', async () => {
    const transport: EmailSender = {
      async send() {
        const failure: EmailError = {
          type: 'VALIDATION',
          message: 'Invalid `to` field',
          statusCode: 422,
        };
        return err(failure);
      },
    };

    const result = await makeIssueEmailSender({ emailSender: transport }).send(email);

    expect(result._unsafeUnwrapErr()).toEqual({ message: 'VALIDATION: Invalid `to` field' });
  });
});
