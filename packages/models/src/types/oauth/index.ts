/**
 * OAuth 2.0 client types: per-service configuration, tokens, their
 * persisted form and the wire shapes exchanged with authorization servers
 */
export * from './ServiceConfig.js';
export * from './OAuth2Token.js';
export * from './PersistedToken.js';
export * from './AuthorizationRequest.js';
export * from './TokenResponse.js';
export * from './OAuthError.js';
