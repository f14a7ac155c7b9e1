/**
 * PKCE (Proof Key for Code Exchange) utilities for the authorization code flow
 * Pure functions with no side effects
 */
import { randomBytes, createHash } from 'crypto';

/**
 * Encodes a buffer as URL-safe base64 without padding (RFC 4648 section 5).
 * @internal
 */
export function base64URLEncode(buffer: Buffer): string {
  return buffer.toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=/g, '');
}

/**
 * Generates a code verifier from 32 random bytes (43 characters, RFC 7636
 * section 4.1).
 * @example
 * ```typescript
 * const verifier = generateCodeVerifier();
 * const challenge = generateCodeChallenge(verifier);
 * ```
 * @public
 */
export function generateCodeVerifier(): string {
  return base64URLEncode(randomBytes(32));
}

/**
 * S256 code challenge: base64url(SHA-256(ASCII verifier)).
 * @public
 */
export function generateCodeChallenge(verifier: string): string {
  const hash = createHash('sha256').update(verifier, 'ascii').digest();
  return base64URLEncode(hash);
}

/**
 * Generates an unguessable `state` value from 32 random bytes.
 * @public
 */
export function generateState(): string {
  return base64URLEncode(randomBytes(32));
}
