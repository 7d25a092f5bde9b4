/**
 * Subscription token format check.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createInvalidSubscriptionTokenError,
  type InvalidSubscriptionTokenError,
} from './errors.js';
import { SUBSCRIPTION_TOKEN_LENGTH } from './types.js';

const TOKEN_PATTERN = new RegExp(`^[A-Za-z0-9]{${String(SUBSCRIPTION_TOKEN_LENGTH)}}$`);

export function parseSubscriptionToken(
  raw: string
): Result<string, InvalidSubscriptionTokenError> {
  return TOKEN_PATTERN.test(raw) ? ok(raw) : err(createInvalidSubscriptionTokenError());
}
