/**
 * Offline expiry decoding for self-describing credentials
 */

import { isRecord } from '@repo/shared-utils';

/**
 * JWT shape: three non-empty dot-separated segments
 */
export function looksLikeJwt(value: string): boolean {
  const parts = value.split('.');
  return parts.length === 3 && parts.every((part) => part.length > 0);
}

/**
 * `exp` claim of a JWT payload, or null when absent or undecodable
 */
export function jwtExpiry(token: string): Date | null {
  const parts = token.split('.');
  const payload = parts[1];
  if (parts.length !== 3 || !payload) {
    return null;
  }

  let claims: unknown;
  try {
    claims = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
  } catch {
    return null;
  }

  if (!isRecord(claims) || typeof claims.exp !== 'number' || !Number.isFinite(claims.exp)) {
    return null;
  }
  return new Date(claims.exp * 1000);
}

/**
 * `se` (signed expiry) query parameter of a SAS URL or bare SAS query string
 */
export function sasExpiry(value: string): Date | null {
  const queryStart = value.indexOf('?');
  const query = queryStart >= 0 ? value.slice(queryStart + 1) : value;
  const se = new URLSearchParams(query).get('se');
  if (!se) {
    return null;
  }

  const timestamp = Date.parse(se);
  return Number.isNaN(timestamp) ? null : new Date(timestamp);
}
