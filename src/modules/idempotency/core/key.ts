/**
 * Idempotency key parsing.
 *
 * Accepts the four common UUID spellings and stores the canonical
 * lowercase hyphenated form, so every spelling of one UUID maps to one record:
 *
 * - hyphenated `67e55044-10b1-426f-9247-bb680e5fe0c8`
 * - simple `67e5504410b1426f9247bb680e5fe0c8`
 * - braced `{67e55044-10b1-426f-9247-bb680e5fe0c8}`
 * - URN `urn:uuid:67e55044-10b1-426f-9247-bb680e5fe0c8`
 *
 * Surrounding whitespace is not part of any of them.
 */

import { ok, err, type Result } from 'neverthrow';
import { validate } from 'uuid';

import { createInvalidIdempotencyKeyError, type InvalidIdempotencyKeyError } from './errors.js';

import type { IdempotencyKey } from './types.js';

const URN_PREFIX = 'urn:uuid:';
const SIMPLE_LENGTH = 32;

const toHyphenated = (raw: string): string => {
  if (raw.startsWith(URN_PREFIX)) {
    return raw.slice(URN_PREFIX.length);
  }
  if (raw.startsWith('{') && raw.endsWith('}')) {
    return raw.slice(1, -1);
  }
  if (raw.length === SIMPLE_LENGTH) {
    return [
      raw.slice(0, 8),
      raw.slice(8, 12),
      raw.slice(12, 16),
      raw.slice(16, 20),
      raw.slice(20),
    ].join('-');
  }
  return raw;
};

export function parseIdempotencyKey(
  raw: string
): Result<IdempotencyKey, InvalidIdempotencyKeyError> {
  const candidate = toHyphenated(raw);
  if (!validate(candidate)) {
    return err(createInvalidIdempotencyKeyError(raw));
  }
  return ok(candidate.toLowerCase() as IdempotencyKey);
}
