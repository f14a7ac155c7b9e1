/**
 * Token held for one authenticated service.
 *
 * A token without `expiresAt` never expires.
 */
export interface OAuth2Token {
  accessToken: string;
  refreshToken?: string;
  /** Absolute expiry instant */
  expiresAt?: Date;
  /** Defaults to `Bearer` */
  tokenType: string;
  /** Scope granted by the server, when reported */
  scope?: string;
}
