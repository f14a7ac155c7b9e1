import type { AuthorizationUrlResult } from '@multi-oauth/models';
import { type IOAuth2Authenticatable, logEvent } from '@multi-oauth/core';
import { AuthenticationError, type ErrorCode } from '../errors/authentication-error.js';
import type { OAuth2Manager } from '../implementations/oauth2-manager.js';
import { type CallbackQuery, parseCallbackParams } from '../utils/callback.js';

export type AuthorizationCompletion =
  | { serviceName: string; success: true }
  | { serviceName: string; success: false; error: string; errorCode?: ErrorCode };

/**
 * Explicit registry of OAuth2-capable integrations, for dashboards and
 * redirect handlers that work across all services at once.
 * @public
 */
export class IntegrationHub {
  private readonly integrations = new Map<string, IOAuth2Authenticatable>();

  public constructor(private readonly manager: OAuth2Manager) {}

  /** Adds an integration, replacing one with the same service name. */
  public register(integration: IOAuth2Authenticatable): void {
    this.integrations.set(integration.serviceName, integration);
  }

  public get(serviceName: string): IOAuth2Authenticatable | undefined {
    return this.integrations.get(serviceName);
  }

  public list(): string[] {
    return [...this.integrations.keys()];
  }

  /**
   * Starts an authorization for every integration. Integrations that fail
   * are logged and left out.
   */
  public getAuthorizationUrls(): Record<string, AuthorizationUrlResult> {
    const urls: Record<string, AuthorizationUrlResult> = {};
    for (const [serviceName, integration] of this.integrations) {
      try {
        urls[serviceName] = integration.getAuthorizationUrl();
      } catch (error) {
        logEvent('warn', 'auth:authorization_url_failed', {
          serviceName,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return urls;
  }

  /** Whether each integration currently holds a usable token. */
  public async getAuthenticationStatus(): Promise<Record<string, boolean>> {
    const entries = await Promise.all(
      [...this.integrations].map(async ([serviceName, integration]) => {
        try {
          return [serviceName, await integration.isAuthenticated()] as const;
        } catch (error) {
          logEvent('warn', 'auth:status_check_failed', {
            serviceName,
            message: error instanceof Error ? error.message : String(error),
          });
          return [serviceName, false] as const;
        }
      }),
    );
    return Object.fromEntries(entries);
  }

  /**
   * Validates a redirect's query and exchanges its code. Never throws.
   */
  public async completeAuthorization(
    serviceName: string,
    query: CallbackQuery,
  ): Promise<AuthorizationCompletion> {
    try {
      const { code, state } = parseCallbackParams(query);
      await this.manager.exchangeCodeForToken(serviceName, code, state);
      logEvent('info', 'auth:authorization_completed', { serviceName });
      return { serviceName, success: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logEvent('warn', 'auth:authorization_failed', { serviceName, message });
      return {
        serviceName,
        success: false,
        error: message,
        errorCode: error instanceof AuthenticationError ? error.code : undefined,
      };
    }
  }

  public revoke(serviceName: string): Promise<void> {
    return this.manager.revoke(serviceName);
  }
}
