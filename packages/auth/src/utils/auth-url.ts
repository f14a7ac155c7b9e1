/**
 * OAuth2 Authorization URL building utilities
 */
import type { ServiceConfig } from '@multi-oauth/models';
import { CodeChallengeMethods, ResponseTypes } from '@multi-oauth/models';

/**
 * Parameters for building an authorization URL with PKCE.
 * @public
 */
export interface AuthUrlParams {
  config: ServiceConfig;
  /** Random state parameter for CSRF protection */
  state: string;
  /** PKCE code challenge derived from the code verifier */
  codeChallenge: string;
}

/**
 * Builds the authorization URL for a service.
 *
 * Parameters are appended in this order: `response_type`, `client_id`,
 * `redirect_uri`, `scope`, `state`, `code_challenge`,
 * `code_challenge_method`. Query parameters already present on the
 * endpoint are kept.
 * @example
 * ```typescript
 * buildAuthorizationUrl({ config, state: 'xyz', codeChallenge: 'abc' });
 * // https://auth.example.com/authorize?response_type=code&client_id=...
 * ```
 * @public
 */
export function buildAuthorizationUrl(params: AuthUrlParams): string {
  const { config, state, codeChallenge } = params;

  const authUrl = new URL(config.authorizationEndpoint);
  authUrl.searchParams.set('response_type', ResponseTypes.CODE);
  authUrl.searchParams.set('client_id', config.clientId);
  authUrl.searchParams.set('redirect_uri', config.redirectUri);
  authUrl.searchParams.set('scope', config.scope);
  authUrl.searchParams.set('state', state);
  authUrl.searchParams.set('code_challenge', codeChallenge);
  authUrl.searchParams.set('code_challenge_method', CodeChallengeMethods.S256);

  return authUrl.toString();
}
