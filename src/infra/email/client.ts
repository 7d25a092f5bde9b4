/**
 * Resend Email Client
 *
 * Outbound email transport for confirmation emails and newsletter issues.
 * The idempotency key travels in the SDK options, not as a header.
 */

import { ok, err, type Result } from 'neverthrow';
import { Resend } from 'resend';

import type { AppConfig } from '../config/env.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface EmailClientConfig {
  /** Resend API key */
  apiKey: string;
  /** From address for outbound emails */
  fromAddress: string;
  logger: Logger;
}

/**
 * Email tag for Resend.
 * Names and values may only hold ASCII letters, digits, underscores and dashes.
 */
export interface EmailTag {
  name: string;
  value: string;
}

export interface SendEmailParams {
  to: string;
  subject: string;
  html: string;
  text: string;
  /** Deduplicates repeated sends of the same message for 24 hours */
  idempotencyKey?: string;
  tags?: EmailTag[];
}

export interface SendEmailResult {
  /** Resend email ID */
  emailId: string;
}

export interface EmailError {
  type: 'RATE_LIMITED' | 'VALIDATION' | 'SERVER' | 'NETWORK' | 'UNKNOWN';
  message: string;
  statusCode?: number;
}

/**
 * Email sender interface (port).
 */
export interface EmailSender {
  send(params: SendEmailParams): Promise<Result<SendEmailResult, EmailError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a Resend email client.
 */
export const makeEmailClient = (config: EmailClientConfig): EmailSender => {
  const { apiKey, fromAddress, logger } = config;
  const log = logger.child({ component: 'EmailClient' });
  const resend = new Resend(apiKey);

  log.info('Initializing Resend email client');

  return {
    async send(params: SendEmailParams): Promise<Result<SendEmailResult, EmailError>> {
      const { to, subject, html, text, idempotencyKey, tags = [] } = params;

      log.debug({ to, subject, idempotencyKey, tagCount: tags.length }, 'Sending email');

      try {
        const result = await resend.emails.send(
          { from: fromAddress, to, subject, html, text, tags },
          idempotencyKey !== undefined ? { idempotencyKey } : undefined
        );

        if (result.error !== null) {
          log.warn({ error: result.error, to, idempotencyKey }, 'Resend API returned error');
          return err(mapResendError(result.error));
        }

        log.info({ emailId: result.data.id, to, idempotencyKey }, 'Email sent');
        return ok({ emailId: result.data.id });
      } catch (error) {
        log.error({ err: error, to, idempotencyKey }, 'Failed to send email');
        return err(mapCaughtError(error));
      }
    },
  };
};

/**
 * Creates the email client from configuration. Both the API key and the
 * sender address are required to send anything.
 */
export const initEmailClient = (config: AppConfig, logger: Logger): EmailSender => {
  const { apiKey, fromAddress } = config.email;

  if (apiKey === undefined || fromAddress === undefined) {
    throw new Error('Missing configuration for email (RESEND_API_KEY, EMAIL_FROM_ADDRESS)');
  }

  return makeEmailClient({ apiKey, fromAddress, logger });
};

/**
 * Maps a Resend API error to an EmailError.
 */
export function mapResendError(error: {
  message: string;
  name: string;
  statusCode?: number | null;
}): EmailError {
  const statusCode = error.statusCode ?? undefined;
  const base = statusCode !== undefined ? { statusCode } : {};

  if (statusCode === 429) {
    return { type: 'RATE_LIMITED', message: 'Rate limit exceeded', ...base };
  }

  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return { type: 'VALIDATION', message: error.message, ...base };
  }

  if (statusCode !== undefined && statusCode >= 500) {
    return { type: 'SERVER', message: error.message, ...base };
  }

  return { type: 'UNKNOWN', message: error.message };
}

/**
 * Maps a thrown error to an EmailError.
 */
export function mapCaughtError(error: unknown): EmailError {
  if (!(error instanceof Error)) {
    return { type: 'UNKNOWN', message: 'Unknown error occurred' };
  }

  const isNetworkError = ['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND'].some((code) =>
    error.message.includes(code)
  );

  return isNetworkError
    ? { type: 'NETWORK', message: error.message }
    : { type: 'UNKNOWN', message: error.message };
}
