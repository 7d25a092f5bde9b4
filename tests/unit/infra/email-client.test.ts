import { describe, expect, it } from 'vitest';

import { initEmailClient, mapCaughtError, mapResendError } from '@/infra/email/client.js';
import { createSilentLogger } from '@/infra/logger/index.js';

import { makeTestConfig } from '../../fixtures/builders.js';

describe('mapResendError', () => {
  it('maps rate limiting to RATE_LIMITED with the status code', () => {
    expect(mapResendError({ name: 'rate_limit_exceeded', message: 'Too many requests', statusCode: 429 })).toEqual({
      type: 'RATE_LIMITED',
      message: 'Rate limit exceeded',
      statusCode: 429,
    });
  });

  it('treats other 4xx responses as validation errors', () => {
    expect(
      mapResendError({ name: 'validation_error', message: 'Invalid `to` field', statusCode: 422 })
    ).toEqual({ type: 'VALIDATION', message: 'Invalid `to` field', statusCode: 422 });
  });

  it('treats 5xx responses as server errors', () => {
    expect(
      mapResendError({ name: 'application_error', message: 'Internal error', statusCode: 503 })
    ).toEqual({ type: 'SERVER', message: 'Internal error', statusCode: 503 });
  });

  it('falls back to unknown without a status code', () => {
    expect(mapResendError({ name: 'unknown', message: 'Odd', statusCode: null })).toEqual({
      type: 'UNKNOWN',
      message: 'Odd',
    });
  });
});

describe('mapCaughtError', () => {
  it('recognises network failures', () => {
    expect(mapCaughtError(new Error('connect ECONNREFUSED 127.0.0.1:443'))).toEqual({
      type: 'NETWORK',
      message: 'connect ECONNREFUSED 127.0.0.1:443',
    });
  });

  it('maps other errors to unknown', () => {
    expect(mapCaughtError(new Error('boom'))).toEqual({ type: 'UNKNOWN', message: 'boom' });
    expect(mapCaughtError('boom')).toEqual({
      type: 'UNKNOWN',
      message: 'Unknown error occurred',
    });
  });
});

describe('initEmailClient', () => {
  it('requires the API key and sender address', () => {
    expect(() => initEmailClient(makeTestConfig(), createSilentLogger())).toThrow(
      'Missing configuration for email (RESEND_API_KEY, EMAIL_FROM_ADDRESS)'
    );
  });

  it('builds a sender from configuration', () => {
    const config = makeTestConfig({
      RESEND_API_KEY: 'test-secret',
      EMAIL_FROM_ADDRESS: 'news@newsletter.test',
    });

    expect(typeof initEmailClient(config, createSilentLogger()).send).toBe('function');
  });
});
