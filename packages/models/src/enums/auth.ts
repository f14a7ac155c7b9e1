/**
 * Grant types this client sends to token endpoints
 */
export const GrantTypes = {
  AUTHORIZATION_CODE: 'authorization_code',
  REFRESH_TOKEN: 'refresh_token',
} as const;

export type GrantType = (typeof GrantTypes)[keyof typeof GrantTypes];

/**
 * Standard OAuth 2.0 response types
 */
export const ResponseTypes = {
  CODE: 'code',
} as const;

/**
 * PKCE code challenge methods. Only S256 is ever sent.
 */
export const CodeChallengeMethods = {
  S256: 'S256',
} as const;

/**
 * Authentication state of a single service, derived from the token set and
 * the pending authorization attempts. A revoked service is reported as
 * `UNAUTHENTICATED`.
 */
export enum ServiceAuthState {
  UNAUTHENTICATED = 'unauthenticated',
  AUTHORIZATION_PENDING = 'authorization_pending',
  AUTHENTICATED_VALID = 'authenticated_valid',
  AUTHENTICATED_EXPIRED = 'authenticated_expired',
}
