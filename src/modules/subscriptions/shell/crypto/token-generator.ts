import { randomInt } from 'crypto';

import { SUBSCRIPTION_TOKEN_LENGTH } from '../../core/types.js';

import type { TokenGenerator } from '../../core/ports.js';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Subscription tokens drawn uniformly from letters and digits.
 */
export const makeTokenGenerator = (): TokenGenerator => ({
  generate(): string {
    let token = '';
    for (let i = 0; i < SUBSCRIPTION_TOKEN_LENGTH; i++) {
      token += ALPHABET.charAt(randomInt(ALPHABET.length));
    }
    return token;
  },
});
