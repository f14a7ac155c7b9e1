/**
 * Result of building an authorization URL for a service
 */
export interface AuthorizationUrlResult {
  /** Fully query-encoded URL to send the resource owner to */
  url: string;
  /** State value that the callback must echo back */
  state: string;
}

/**
 * Parameters a redirect handler forwards after a successful callback
 */
export interface AuthorizationCallback {
  code: string;
  state: string;
}
