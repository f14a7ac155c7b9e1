/**
 * Successful token endpoint response (RFC 6749 section 5.1) as this client
 * reads it. Only `access_token` is required; some servers send
 * `expires_in` as a numeric string.
 */
export interface TokenResponse {
  /** Access token */
  access_token: string;
  /** Token type, `Bearer` when omitted */
  token_type?: string;
  /** Access token lifetime in seconds */
  expires_in?: number;
  /** Refresh token, when the server issues one */
  refresh_token?: string;
  /** Granted scopes */
  scope?: string;
}
