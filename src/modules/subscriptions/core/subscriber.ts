/**
 * Subscriber domain values.
 *
 * Parsed when someone subscribes and parsed again before every send, since
 * stored rows may predate the current rules.
 */

import { ok, err, type Result } from 'neverthrow';

import { createInvalidSubscriberError, type InvalidSubscriberError } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Branded Types
// ─────────────────────────────────────────────────────────────────────────────

// eslint-disable-next-line @typescript-eslint/naming-convention -- __brand is the standard pattern for branded types in TypeScript
export type SubscriberEmail = string & { readonly __brand: unique symbol };

// eslint-disable-next-line @typescript-eslint/naming-convention -- __brand is the standard pattern for branded types in TypeScript
export type SubscriberName = string & { readonly __brand: unique symbol };

export interface NewSubscriber {
  readonly email: SubscriberEmail;
  readonly name: SubscriberName;
}

// ─────────────────────────────────────────────────────────────────────────────
// Rules
// ─────────────────────────────────────────────────────────────────────────────

export const MAX_NAME_LENGTH = 256;
export const MAX_EMAIL_LENGTH = 254;

const FORBIDDEN_NAME_CHARACTERS = new Set(['/', '(', ')', '"', '<', '>', '\\', '{', '}']);

// local@domain.tld, no whitespace, a single @
const EMAIL_PATTERN = /^[^\s@]+@[^\s@.]+(\.[^\s@.]+)+$/;

// ─────────────────────────────────────────────────────────────────────────────
// Parsers
// ─────────────────────────────────────────────────────────────────────────────

export function parseSubscriberName(raw: string): Result<SubscriberName, InvalidSubscriberError> {
  const name = raw.trim();
  // Count code points, not UTF-16 units
  const length = [...name].length;

  if (length === 0) {
    return err(createInvalidSubscriberError('name', 'Name must not be empty.'));
  }
  if (length > MAX_NAME_LENGTH) {
    return err(
      createInvalidSubscriberError('name', `Name must be at most ${String(MAX_NAME_LENGTH)} characters.`)
    );
  }
  if ([...name].some((char) => FORBIDDEN_NAME_CHARACTERS.has(char))) {
    return err(createInvalidSubscriberError('name', 'Name contains forbidden characters.'));
  }

  return ok(name as SubscriberName);
}

export function parseSubscriberEmail(raw: string): Result<SubscriberEmail, InvalidSubscriberError> {
  const email = raw.trim();

  if (email.length === 0 || email.length > MAX_EMAIL_LENGTH || !EMAIL_PATTERN.test(email)) {
    return err(createInvalidSubscriberError('email', `"${raw}" is not a valid email address.`));
  }

  return ok(email as SubscriberEmail);
}

export function parseNewSubscriber(input: {
  email: string;
  name: string;
}): Result<NewSubscriber, InvalidSubscriberError> {
  return parseSubscriberName(input.name).andThen((name) =>
    parseSubscriberEmail(input.email).map((email) => ({ email, name }))
  );
}
