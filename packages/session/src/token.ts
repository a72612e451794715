/**
 * Access token helpers
 * @evolve/session
 *
 * Client-side claim reading only. Signatures are never verified here;
 * the server remains the authority on token validity.
 */

import jwt from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';

/**
 * Decode JWT claims without verification
 */
export function decodeToken(token: string): JwtPayload | null {
  let decoded: unknown;
  try {
    decoded = jwt.decode(token, { json: true });
  } catch {
    return null;
  }
  return isClaimSet(decoded) ? decoded : null;
}

// A JWS whose payload is a bare JSON value decodes to that value
function isClaimSet(value: unknown): value is JwtPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Expiry of the token in epoch milliseconds, or null when the token
 * has no readable `exp` claim
 */
export function getTokenExpiry(token: string): number | null {
  const claims = decodeToken(token);
  if (!claims || typeof claims.exp !== 'number') {
    return null;
  }
  return claims.exp * 1000;
}

/**
 * Milliseconds until the token expires (negative once expired)
 */
export function getTimeUntilExpiry(token: string, now: number = Date.now()): number | null {
  const expiresAt = getTokenExpiry(token);
  if (expiresAt === null) {
    return null;
  }
  return expiresAt - now;
}
