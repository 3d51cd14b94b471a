import { describe, it, expect } from 'vitest';
import { RequestGovernor, parseAuthorization } from './RequestGovernor.js';
import { SlidingWindowRateLimiter } from './SlidingWindowRateLimiter.js';
import { PayloadTooLargeError } from '../types/errors.js';

const API_TOKEN = 'test-api-token';

function createGovernor(maxRequests = 10, maxTextLength?: number): RequestGovernor {
  return new RequestGovernor({
    apiToken: API_TOKEN,
    rateLimiter: new SlidingWindowRateLimiter({ maxRequests, windowSeconds: 60, now: () => 0 }),
    maxTextLength,
  });
}

describe('parseAuthorization', () => {
  it('splits scheme and credential at the first space', () => {
    expect(parseAuthorization('Bearer abc123')).toEqual({ scheme: 'Bearer', credential: 'abc123' });
    expect(parseAuthorization('  bearer   abc123 ')).toEqual({ scheme: 'bearer', credential: 'abc123' });
  });

  it('leaves the credential empty when none is given', () => {
    expect(parseAuthorization('Bearer ')).toEqual({ scheme: 'Bearer', credential: '' });
    expect(parseAuthorization('abc123')).toEqual({ scheme: 'abc123', credential: '' });
    expect(parseAuthorization('')).toEqual({ scheme: '', credential: '' });
  });
});

describe('RequestGovernor.admit', () => {
  it('admits a matching bearer token', () => {
    const decision = createGovernor().admit({ clientId: 'c1', authorization: `Bearer ${API_TOKEN}` });
    expect(decision).toEqual({ outcome: 'admitted', clientId: 'c1' });
  });

  it('rejects a missing header as missing_credentials', () => {
    const decision = createGovernor().admit({ clientId: 'c1' });
    expect(decision).toEqual({ outcome: 'rejected', reason: 'missing_credentials', clientId: 'c1' });
  });

  it('treats a header without a credential as missing_credentials', () => {
    const governor = createGovernor();
    for (const authorization of ['Bearer', 'Bearer   ', '   ']) {
      expect(governor.admit({ clientId: 'c1', authorization })).toEqual({
        outcome: 'rejected',
        reason: 'missing_credentials',
        clientId: 'c1',
      });
    }
  });

  it('rejects a non-Bearer scheme as invalid_scheme', () => {
    const decision = createGovernor().admit({ clientId: 'c1', authorization: `Token ${API_TOKEN}` });
    expect(decision).toEqual({ outcome: 'rejected', reason: 'invalid_scheme', clientId: 'c1' });
  });

  it('rejects a wrong token as invalid_token', () => {
    const governor = createGovernor();
    expect(governor.admit({ clientId: 'c1', authorization: 'Bearer wrong-token' })).toEqual({
      outcome: 'rejected',
      reason: 'invalid_token',
      clientId: 'c1',
    });
    // Prefix of the real token must not match
    expect(governor.admit({ clientId: 'c1', authorization: 'Bearer test-api' })).toMatchObject({
      reason: 'invalid_token',
    });
  });

  it('checks the rate limit before credentials', () => {
    const governor = createGovernor(1);
    expect(governor.admit({ clientId: 'c1' }).outcome).toBe('rejected');

    const decision = governor.admit({ clientId: 'c1', authorization: `Bearer ${API_TOKEN}` });
    expect(decision).toEqual({
      outcome: 'rejected',
      reason: 'rate_limited',
      clientId: 'c1',
      retryAfterSeconds: 60,
    });
  });

  it('requires a non-empty secret', () => {
    expect(() => new RequestGovernor({
      apiToken: '',
      rateLimiter: new SlidingWindowRateLimiter(),
    })).toThrow('RequestGovernor requires a non-empty apiToken');
  });
});

describe('RequestGovernor.sanitize', () => {
  it('applies the configured maximum length', () => {
    const governor = createGovernor(10, 4);
    expect(governor.sanitize('abcd')).toBe('abcd');
    expect(() => governor.sanitize('abcde')).toThrow(PayloadTooLargeError);
  });
});
