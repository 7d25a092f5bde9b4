import { describe, expect, it } from 'vitest';

import { parseIdempotencyKey } from '@/modules/idempotency/index.js';

const CANONICAL = '67e55044-10b1-426f-9247-bb680e5fe0c8';

describe('parseIdempotencyKey', () => {
  it('accepts a hyphenated UUID and lowercases it', () => {
    const result = parseIdempotencyKey('67E55044-10B1-426F-9247-BB680E5FE0C8');

    expect(result._unsafeUnwrap()).toBe(CANONICAL);
  });

  it.each([
    { spelling: 'simple', raw: '67e5504410b1426f9247bb680e5fe0c8' },
    { spelling: 'braced', raw: '{67e55044-10b1-426f-9247-bb680e5fe0c8}' },
    { spelling: 'urn', raw: 'urn:uuid:67e55044-10b1-426f-9247-bb680e5fe0c8' },
  ])('maps the $spelling form to the hyphenated form', ({ raw }) => {
    expect(parseIdempotencyKey(raw)._unsafeUnwrap()).toBe(CANONICAL);
  });

  it('rejects a value that is not a UUID', () => {
    const error = parseIdempotencyKey('not-a-uuid')._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'InvalidIdempotencyKeyError',
      message: 'The idempotency key must be a valid UUID.',
      rawKey: 'not-a-uuid',
    });
  });

  it.each([
    { label: 'empty', raw: '' },
    { label: 'padded with whitespace', raw: ` ${CANONICAL}\n` },
    { label: 'braced simple', raw: '{67e5504410b1426f9247bb680e5fe0c8}' },
    { label: 'simple with a non-hex digit', raw: '67e5504410b1426f9247bb680e5fe0cz' },
    { label: 'one digit short', raw: '67e55044-10b1-426f-9247-bb680e5fe0c' },
  ])('rejects a key that is $label', ({ raw }) => {
    expect(parseIdempotencyKey(raw).isErr()).toBe(true);
  });
});
