import { tokenClaimsSchema, type TokenClaims } from '@taskpad/shared';
import { MalformedTokenError } from '../utils/errors';

// Compact JWT: header.payload.signature. Only the payload is read here;
// the signature is the server's business.

function decodeBase64Url(segment: string): string {
  const base64 = segment.replace(/-/g, '+').replace(/_/g, '/');
  const padded = base64 + '='.repeat((4 - (base64.length % 4)) % 4);
  const binary = atob(padded);
  const bytes = Uint8Array.from(binary, (char) => char.charCodeAt(0));
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

/**
 * Decode the claims carried in a token's payload segment. No signature check.
 *
 * @throws MalformedTokenError when the token is not three non-empty segments
 * or the payload is not a base64url-encoded JSON object
 */
export function decodeToken(token: string): TokenClaims {
  const parts = token.split('.');
  if (parts.length !== 3 || parts.some((part) => part.length === 0)) {
    throw new MalformedTokenError('Token must have three non-empty segments');
  }

  let payload: unknown;
  try {
    payload = JSON.parse(decodeBase64Url(parts[1]));
  } catch {
    throw new MalformedTokenError('Token payload is not valid base64url JSON');
  }

  const result = tokenClaimsSchema.safeParse(payload);
  if (!result.success) {
    throw new MalformedTokenError('Token payload is not an object');
  }
  return result.data;
}

/** `exp` (seconds) as ms since epoch, or null when absent or not a number. */
export function extractExpiry(claims: TokenClaims): number | null {
  const { exp } = claims;
  if (typeof exp !== 'number' || !Number.isFinite(exp)) {
    return null;
  }
  return exp * 1000;
}

export function readTokenExpiry(token: string): number | null {
  try {
    return extractExpiry(decodeToken(token));
  } catch {
    return null;
  }
}

/**
 * A token is fresh while `now < expiry - bufferWindow`. A missing expiry is never fresh.
 */
export function isTokenFresh(
  expiry: number | null,
  bufferWindow: number,
  now: number = Date.now()
): boolean {
  if (expiry === null) return false;
  return now < expiry - bufferWindow;
}
