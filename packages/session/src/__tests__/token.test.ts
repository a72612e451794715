/**
 * Access Token Helper Tests
 * @evolve/session
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import jwt from 'jsonwebtoken';
import { decodeToken, getTimeUntilExpiry, getTokenExpiry } from '../token';
import { makeToken } from './fixtures';

describe('Token helpers', () => {
  const now = Date.UTC(2025, 0, 1, 12, 0, 0);

  it('should read claims without verifying the signature', () => {
    const token = jwt.sign({ sub: 'user-1', role: 'member' }, 'some-other-secret');
    expect(decodeToken(token)).toMatchObject({ sub: 'user-1', role: 'member' });
  });

  it('should return the expiry in milliseconds', () => {
    const token = makeToken(600, now);
    expect(getTokenExpiry(token)).toBe(now + 600_000);
    expect(getTimeUntilExpiry(token, now)).toBe(600_000);
  });

  it('should report expired tokens as negative time left', () => {
    expect(getTimeUntilExpiry(makeToken(-60, now), now)).toBe(-60_000);
  });

  it('should return null for tokens without exp', () => {
    const token = jwt.sign({ sub: 'user-1' }, 'test-secret', { noTimestamp: true });
    expect(getTokenExpiry(token)).toBeNull();
    expect(getTimeUntilExpiry(token, now)).toBeNull();
  });

  it('should never throw on arbitrary input', () => {
    fc.assert(
      fc.property(fc.string(), value => {
        const claims = decodeToken(value);
        return claims === null || typeof claims === 'object';
      }),
      { numRuns: 200 }
    );
    expect(decodeToken('not.a.jwt')).toBeNull();
    expect(getTokenExpiry('')).toBeNull();
  });
});
