import type { OAuth2Token, TokenResponse } from '@multi-oauth/models';

export const DEFAULT_TOKEN_TYPE = 'Bearer';

function expiryFrom(response: TokenResponse, now: Date): Date | undefined {
  return response.expires_in === undefined
    ? undefined
    : new Date(now.getTime() + response.expires_in * 1000);
}

/**
 * Builds the token stored after a successful code exchange.
 *
 * `expiresAt` is `now + expires_in`; without `expires_in` the token never
 * expires.
 * @public
 */
export function parseTokenResponse(response: TokenResponse, now: Date): OAuth2Token {
  return {
    accessToken: response.access_token,
    refreshToken: response.refresh_token,
    expiresAt: expiryFrom(response, now),
    tokenType: response.token_type ?? DEFAULT_TOKEN_TYPE,
    scope: response.scope,
  };
}

/**
 * Applies a refresh response to the previous token.
 *
 * Access token and expiry are always replaced. Refresh token, token type
 * and scope are replaced only when the server returned new values.
 * @public
 */
export function mergeRefreshedToken(
  previous: OAuth2Token,
  response: TokenResponse,
  now: Date,
): OAuth2Token {
  return {
    accessToken: response.access_token,
    refreshToken: response.refresh_token ?? previous.refreshToken,
    expiresAt: expiryFrom(response, now),
    tokenType: response.token_type ?? previous.tokenType,
    scope: response.scope ?? previous.scope,
  };
}

/**
 * Whether `token` must be refreshed before use at `now`.
 * @param leewaySeconds - Treat tokens as expired this long before `expiresAt`
 * @public
 */
export function isTokenExpired(token: OAuth2Token, now: Date, leewaySeconds = 0): boolean {
  if (!token.expiresAt) {
    return false;
  }
  return now.getTime() >= token.expiresAt.getTime() - leewaySeconds * 1000;
}
