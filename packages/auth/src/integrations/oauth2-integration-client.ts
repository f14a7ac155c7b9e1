import type { AuthorizationUrlResult } from '@multi-oauth/models';
import { type IOAuth2Authenticatable, logEvent } from '@multi-oauth/core';
import { AuthenticationError } from '../errors/authentication-error.js';
import type { OAuth2Manager } from '../implementations/oauth2-manager.js';
import type { FetchLike } from '../utils/request/token-request.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface IntegrationRequestInit {
  query?: Record<string, string>;
  /** Serialized as JSON */
  body?: unknown;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export type IntegrationResult =
  | { success: true; status: number; data: unknown }
  | { success: false; status?: number; error: string };

function parseBody(text: string): unknown {
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Base class of REST integrations that authenticate through
 * {@link OAuth2Manager}. Requests carry the service's current bearer token;
 * failures come back as `{ success: false, error }` instead of throwing.
 *
 * @example
 * ```typescript
 * class CalendlyClient extends OAuth2IntegrationClient {
 *   constructor(manager: OAuth2Manager) {
 *     super('calendly', manager, 'https://api.calendly.com');
 *   }
 *
 *   currentUser(): Promise<IntegrationResult> {
 *     return this.request('GET', '/users/me');
 *   }
 * }
 * ```
 * @public
 */
export class OAuth2IntegrationClient implements IOAuth2Authenticatable {
  private readonly fetchImpl: FetchLike;

  public constructor(
    public readonly serviceName: string,
    protected readonly manager: OAuth2Manager,
    protected readonly baseUrl: string,
    fetchImpl?: FetchLike,
  ) {
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  public isAuthenticated(): Promise<boolean> {
    return this.manager.isAuthenticated(this.serviceName);
  }

  public getAuthorizationUrl(): AuthorizationUrlResult {
    return this.manager.generateAuthorizationUrl(this.serviceName);
  }

  /**
   * Sends an authenticated request.
   * @param path - Resolved against the client's base URL
   */
  public async request(
    method: HttpMethod,
    path: string,
    init: IntegrationRequestInit = {},
  ): Promise<IntegrationResult> {
    let authorization: Record<string, string>;
    try {
      authorization = await this.manager.getAuthorizationHeaders(this.serviceName);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        return { success: false, error: `Not authenticated with ${this.serviceName}` };
      }
      throw error;
    }

    const url = new URL(path, this.baseUrl);
    for (const [name, value] of Object.entries(init.query ?? {})) {
      url.searchParams.set(name, value);
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...init.headers,
      ...authorization,
    };
    if (init.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    try {
      const response = await this.fetchImpl(url.toString(), {
        method,
        headers,
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
        signal: init.signal,
      });
      const data = parseBody(await response.text());

      if (!response.ok) {
        logEvent('warn', 'auth:integration_request_failed', {
          serviceName: this.serviceName,
          method,
          path: url.pathname,
          status: response.status,
        });
        return { success: false, status: response.status, error: `HTTP ${response.status}` };
      }
      return { success: true, status: response.status, data };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logEvent('warn', 'auth:integration_request_failed', {
        serviceName: this.serviceName,
        method,
        path: url.pathname,
        message,
      });
      return { success: false, error: message };
    }
  }
}
