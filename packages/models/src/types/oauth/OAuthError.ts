/**
 * OAuth error response, returned by token endpoints and carried as query
 * parameters on a failed authorization callback
 */
export interface OAuthError {
  /** Error code */
  error: string;
  /** Human-readable error description */
  error_description?: string;
  /** URI with error information */
  error_uri?: string;
}
