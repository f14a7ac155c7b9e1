import {
  type AuthorizationUrlResult,
  type OAuth2Token,
  type ServiceConfig,
  ServiceAuthState,
} from '@multi-oauth/models';
import { type ITokenStore, KeyedLock, logError, logEvent, RequestUtils } from '@multi-oauth/core';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '@multi-oauth/schemas';
import { AuthenticationError } from '../errors/authentication-error.js';
import { RefreshError, TokenExchangeError } from '../errors/oauth2-errors.js';
import { TokenStoreFactory } from '../token-store-factory.js';
import { buildAuthorizationUrl } from '../utils/auth-url.js';
import { generateCodeChallenge, generateCodeVerifier, generateState } from '../utils/pkce.js';
import {
  buildAuthorizationCodeBody,
  buildRefreshTokenBody,
  type FetchLike,
  requestToken,
  type TokenRequestResult,
} from '../utils/request/token-request.js';
import {
  isTokenExpired,
  mergeRefreshedToken,
  parseTokenResponse,
} from '../utils/token/parse-token-response.js';
import { PkceVerifierCache } from './pkce-verifier-cache.js';
import { ServiceConfigRegistry } from './service-config-registry.js';

export interface OAuth2ManagerOptions {
  registry?: ServiceConfigRegistry;
  /** Defaults to `TokenStoreFactory.create('auto')` */
  tokenStore?: ITokenStore;
  verifierCache?: PkceVerifierCache;
  /** Upper bound of one token endpoint call, 30 s by default */
  requestTimeoutMs?: number;
  /** Refresh tokens this many seconds before they expire, 0 by default */
  expiryLeewaySeconds?: number;
  fetch?: FetchLike;
  now?: () => Date;
}

export interface TokenRequestCallOptions {
  signal?: AbortSignal;
}

/**
 * Drives the OAuth2 authorization code flow with PKCE for any number of
 * independently configured services, and keeps their tokens fresh.
 *
 * Token mutations of one service (code exchange, refresh, revocation) are
 * serialized. Concurrent refreshes of one service share a single token
 * endpoint request.
 *
 * @example
 * ```typescript
 * const manager = await OAuth2Manager.create({
 *   tokenStore: new FileTokenStore('.oauth_tokens.json'),
 * });
 * manager.registerService(hubspot(clientId, clientSecret, redirectUri));
 *
 * const { url } = manager.generateAuthorizationUrl('hubspot');
 * // ...the user authorizes, the redirect handler receives code and state
 * await manager.exchangeCodeForToken('hubspot', code, state);
 *
 * const headers = await manager.getAuthorizationHeaders('hubspot');
 * ```
 * @public
 */
export class OAuth2Manager {
  public readonly registry: ServiceConfigRegistry;
  private readonly tokenStore: ITokenStore;
  private readonly verifierCache: PkceVerifierCache;
  private readonly requestTimeoutMs: number;
  private readonly expiryLeewaySeconds: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;
  private readonly lock = new KeyedLock();
  private readonly refreshes = new Map<string, Promise<OAuth2Token>>();

  private constructor(options: OAuth2ManagerOptions) {
    this.now = options.now ?? (() => new Date());
    this.registry = options.registry ?? new ServiceConfigRegistry();
    this.tokenStore = options.tokenStore ?? TokenStoreFactory.create('auto');
    this.verifierCache =
      options.verifierCache ?? new PkceVerifierCache({ now: () => this.now().getTime() });
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.expiryLeewaySeconds = options.expiryLeewaySeconds ?? 0;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Creates a manager and loads persisted tokens.
   * @public
   */
  public static async create(options: OAuth2ManagerOptions = {}): Promise<OAuth2Manager> {
    const manager = new OAuth2Manager(options);
    await manager.tokenStore.load();
    logEvent('info', 'auth:manager_ready', {
      services: manager.registry.list(),
      storedTokens: manager.tokenStore.services(),
    });
    return manager;
  }

  /**
   * @throws {ConfigurationError} When the configuration is invalid
   */
  public registerService(config: ServiceConfig): Readonly<ServiceConfig> {
    return this.registry.register(config);
  }

  public listServices(): string[] {
    return this.registry.list();
  }

  /**
   * Starts an authorization: creates the PKCE pair, remembers the verifier
   * under `(serviceName, state)` and returns the URL to send the user to.
   *
   * @param state - Caller-chosen state; a random one is generated when omitted or empty
   * @throws {ConfigurationError} When the service is not registered
   */
  public generateAuthorizationUrl(serviceName: string, state?: string): AuthorizationUrlResult {
    const config = this.registry.get(serviceName);
    const authState = state || generateState();
    const codeVerifier = generateCodeVerifier();

    const url = buildAuthorizationUrl({
      config,
      state: authState,
      codeChallenge: generateCodeChallenge(codeVerifier),
    });
    this.verifierCache.put(serviceName, authState, codeVerifier);

    logEvent('info', 'auth:authorization_started', { serviceName });
    return { url, state: authState };
  }

  /**
   * Completes an authorization with the code and state received on the
   * redirect. The pending verifier is consumed even when the exchange fails.
   *
   * @throws {ConfigurationError} When the service is not registered
   * @throws {StateMismatchError} When no pending authorization matches
   * @throws {TokenExchangeError} When the token endpoint call fails; stored
   * tokens are left untouched
   */
  public async exchangeCodeForToken(
    serviceName: string,
    code: string,
    state: string,
    options: TokenRequestCallOptions = {},
  ): Promise<OAuth2Token> {
    const config = this.registry.get(serviceName);
    const codeVerifier = this.verifierCache.takeAndRemove(serviceName, state);
    const requestId = RequestUtils.generateRequestId('exchange');

    const result = await this.callTokenEndpoint(
      config,
      buildAuthorizationCodeBody(config, code, codeVerifier),
      requestId,
      options.signal,
    );
    if (!result.ok) {
      logEvent('warn', 'auth:token_exchange_failed', {
        serviceName,
        requestId,
        failure: result.error.kind,
        status: result.error.status,
        oauthError: result.error.oauthError,
      });
      throw new TokenExchangeError(serviceName, result.error);
    }

    const token = parseTokenResponse(result.value, this.now());
    await this.lock.run(serviceName, () => this.tokenStore.save(serviceName, token));

    logEvent('info', 'auth:token_exchanged', {
      serviceName,
      requestId,
      expiresAt: token.expiresAt?.toISOString(),
      hasRefreshToken: token.refreshToken !== undefined,
    });
    return token;
  }

  /**
   * Obtains a new access token with the stored refresh token. Calls made
   * while a refresh of the same service is running receive its result; the
   * first caller's signal governs the shared request.
   *
   * @throws {ConfigurationError} When the service is not registered
   * @throws {RefreshError} With reason `no_token`, `no_refresh_token` or
   * `request_failed`; on failure the stale token stays stored
   */
  public refreshToken(
    serviceName: string,
    options: TokenRequestCallOptions = {},
  ): Promise<OAuth2Token> {
    const inFlight = this.refreshes.get(serviceName);
    if (inFlight) {
      return inFlight;
    }

    const refresh = this.performRefresh(serviceName, options.signal).finally(() => {
      this.refreshes.delete(serviceName);
    });
    this.refreshes.set(serviceName, refresh);
    return refresh;
  }

  /**
   * Returns a usable token, refreshing an expired one first. Any refresh
   * failure is logged and reported as `undefined`.
   */
  public async getValidToken(serviceName: string): Promise<OAuth2Token | undefined> {
    const token = this.tokenStore.get(serviceName);
    if (!token) {
      return undefined;
    }
    if (!this.isExpired(token)) {
      return token;
    }

    logEvent('debug', 'auth:token_expired', {
      serviceName,
      expiresAt: token.expiresAt?.toISOString(),
    });
    try {
      return await this.refreshToken(serviceName);
    } catch (error) {
      if (error instanceof RefreshError) {
        logEvent('warn', 'auth:token_unavailable', {
          serviceName,
          reason: error.reason,
          message: error.message,
        });
      } else {
        logError('auth:get_valid_token', error, { serviceName });
      }
      return undefined;
    }
  }

  public async isAuthenticated(serviceName: string): Promise<boolean> {
    return (await this.getValidToken(serviceName)) !== undefined;
  }

  /**
   * Forgets the token of a service and abandons its pending authorizations.
   * Local only; idempotent.
   */
  public async revoke(serviceName: string): Promise<void> {
    this.verifierCache.clear(serviceName);
    await this.lock.run(serviceName, () => this.tokenStore.delete(serviceName));
    logEvent('info', 'auth:token_revoked', { serviceName });
  }

  public getAuthState(serviceName: string): ServiceAuthState {
    const token = this.tokenStore.get(serviceName);
    if (token) {
      return this.isExpired(token)
        ? ServiceAuthState.AUTHENTICATED_EXPIRED
        : ServiceAuthState.AUTHENTICATED_VALID;
    }
    return this.verifierCache.hasPending(serviceName)
      ? ServiceAuthState.AUTHORIZATION_PENDING
      : ServiceAuthState.UNAUTHENTICATED;
  }

  /**
   * Headers that authenticate a request against the service's API.
   * @throws {AuthenticationError} When no valid token is available
   */
  public async getAuthorizationHeaders(serviceName: string): Promise<Record<string, string>> {
    const token = await this.getValidToken(serviceName);
    if (!token) {
      throw AuthenticationError.missingToken(serviceName);
    }
    return { Authorization: `${token.tokenType} ${token.accessToken}` };
  }

  /** Stops background work. Tokens and configurations stay available. */
  public destroy(): void {
    this.verifierCache.destroy();
  }

  private isExpired(token: OAuth2Token): boolean {
    return isTokenExpired(token, this.now(), this.expiryLeewaySeconds);
  }

  private async performRefresh(serviceName: string, signal?: AbortSignal): Promise<OAuth2Token> {
    const config = this.registry.get(serviceName);
    const current = this.tokenStore.get(serviceName);
    if (!current) {
      throw RefreshError.noToken(serviceName);
    }
    if (!current.refreshToken) {
      throw RefreshError.noRefreshToken(serviceName);
    }

    const requestId = RequestUtils.generateRequestId('refresh');
    const result = await this.callTokenEndpoint(
      config,
      buildRefreshTokenBody(config, current.refreshToken),
      requestId,
      signal,
    );
    if (!result.ok) {
      logEvent('warn', 'auth:token_refresh_failed', {
        serviceName,
        requestId,
        failure: result.error.kind,
        status: result.error.status,
        oauthError: result.error.oauthError,
      });
      throw RefreshError.requestFailed(serviceName, result.error);
    }

    return this.lock.run(serviceName, async () => {
      const latest = this.tokenStore.get(serviceName);
      if (!latest) {
        // Revoked while the request was in flight
        throw RefreshError.noToken(serviceName);
      }
      if (latest.accessToken !== current.accessToken) {
        // A newer code exchange won
        return latest;
      }

      const refreshed = mergeRefreshedToken(latest, result.value, this.now());
      await this.tokenStore.save(serviceName, refreshed);

      logEvent('info', 'auth:token_refreshed', {
        serviceName,
        requestId,
        expiresAt: refreshed.expiresAt?.toISOString(),
        refreshTokenRotated: result.value.refresh_token !== undefined,
      });
      return refreshed;
    });
  }

  private callTokenEndpoint(
    config: Readonly<ServiceConfig>,
    body: URLSearchParams,
    requestId: string,
    signal?: AbortSignal,
  ): Promise<TokenRequestResult> {
    return requestToken(config.tokenEndpoint, body, {
      fetch: this.fetchImpl,
      timeoutMs: this.requestTimeoutMs,
      signal,
      requestId,
    });
  }
}
