import type { AuthorizationUrlResult, OAuth2Token } from '@multi-oauth/models';

/**
 * Per-service token persistence.
 *
 * Reads are served from memory after `load()`. Writes update memory first
 * and then persist the whole set; a failed write is reported through the
 * implementation's error hook and never rejects.
 */
export interface ITokenStore {
  /** Populates the in-memory set from durable storage. Called once at startup. */
  load(): Promise<void>;

  get(serviceName: string): OAuth2Token | undefined;

  has(serviceName: string): boolean;

  /** Names of the services that currently hold a token */
  services(): string[];

  save(serviceName: string, token: OAuth2Token): Promise<void>;

  /** Removes the token of a service. No-op when absent. */
  delete(serviceName: string): Promise<void>;
}

/**
 * Capability implemented by every integration that authenticates through
 * OAuth2. Integrations declare it with `implements`; nothing probes objects
 * for these methods.
 */
export interface IOAuth2Authenticatable {
  readonly serviceName: string;

  isAuthenticated(): Promise<boolean>;

  getAuthorizationUrl(): AuthorizationUrlResult;
}

