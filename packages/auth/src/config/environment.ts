import type { ServiceConfig } from '@multi-oauth/models';
import { logEvent } from '@multi-oauth/core';
import { type OAuthEnvironment, OAuthEnvironmentSchema } from '@multi-oauth/schemas';
import { ConfigurationError } from '../errors/oauth2-errors.js';
import { OAuth2Manager, type OAuth2ManagerOptions } from '../implementations/oauth2-manager.js';
import { ServiceConfigRegistry } from '../implementations/service-config-registry.js';
import { TokenStoreFactory } from '../token-store-factory.js';
import { calendly, hubspot, salesforce, shopify, slack, zendesk } from '../presets/service-presets.js';

/**
 * Validates the process environment.
 * @throws {ConfigurationError} Listing every invalid variable
 */
export function loadOAuthEnvironment(
  env: Record<string, string | undefined> = process.env,
): OAuthEnvironment {
  const parsed = OAuthEnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const variables = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ConfigurationError(`Invalid OAuth environment: ${variables}`);
  }
  return parsed.data;
}

/**
 * Builds a configuration for each service whose credentials (and, for
 * Shopify and Zendesk, host parameter) are present. Redirect URIs are
 * `<OAUTH_REDIRECT_URI>/<service>`.
 */
export function buildServiceConfigs(environment: OAuthEnvironment): ServiceConfig[] {
  const base = environment.OAUTH_REDIRECT_URI.replace(/\/+$/, '');
  const redirectUri = (serviceName: string): string => `${base}/${serviceName}`;
  const configs: ServiceConfig[] = [];

  if (environment.SALESFORCE_CLIENT_ID && environment.SALESFORCE_CLIENT_SECRET) {
    configs.push(
      salesforce(
        environment.SALESFORCE_CLIENT_ID,
        environment.SALESFORCE_CLIENT_SECRET,
        redirectUri('salesforce'),
        environment.SALESFORCE_SANDBOX,
      ),
    );
  }

  if (
    environment.SHOPIFY_CLIENT_ID &&
    environment.SHOPIFY_CLIENT_SECRET &&
    environment.SHOPIFY_SHOP_DOMAIN
  ) {
    configs.push(
      shopify(
        environment.SHOPIFY_CLIENT_ID,
        environment.SHOPIFY_CLIENT_SECRET,
        redirectUri('shopify'),
        environment.SHOPIFY_SHOP_DOMAIN,
      ),
    );
  }

  if (environment.HUBSPOT_CLIENT_ID && environment.HUBSPOT_CLIENT_SECRET) {
    configs.push(
      hubspot(environment.HUBSPOT_CLIENT_ID, environment.HUBSPOT_CLIENT_SECRET, redirectUri('hubspot')),
    );
  }

  if (environment.SLACK_CLIENT_ID && environment.SLACK_CLIENT_SECRET) {
    configs.push(
      slack(environment.SLACK_CLIENT_ID, environment.SLACK_CLIENT_SECRET, redirectUri('slack')),
    );
  }

  if (environment.CALENDLY_CLIENT_ID && environment.CALENDLY_CLIENT_SECRET) {
    configs.push(
      calendly(
        environment.CALENDLY_CLIENT_ID,
        environment.CALENDLY_CLIENT_SECRET,
        redirectUri('calendly'),
      ),
    );
  }

  if (
    environment.ZENDESK_CLIENT_ID &&
    environment.ZENDESK_CLIENT_SECRET &&
    environment.ZENDESK_SUBDOMAIN
  ) {
    configs.push(
      zendesk(
        environment.ZENDESK_CLIENT_ID,
        environment.ZENDESK_CLIENT_SECRET,
        redirectUri('zendesk'),
        environment.ZENDESK_SUBDOMAIN,
      ),
    );
  }

  return configs;
}

/**
 * Wires registry, token store and manager from environment variables.
 * Options in `overrides` win over the environment.
 *
 * @example
 * ```typescript
 * const manager = await createManagerFromEnvironment();
 * console.log(manager.listServices()); // e.g. ['hubspot', 'slack']
 * ```
 */
export async function createManagerFromEnvironment(
  env: Record<string, string | undefined> = process.env,
  overrides: OAuth2ManagerOptions = {},
): Promise<OAuth2Manager> {
  const environment = loadOAuthEnvironment(env);

  const registry = overrides.registry ?? new ServiceConfigRegistry(env);
  for (const config of buildServiceConfigs(environment)) {
    registry.register(config);
  }

  logEvent('info', 'auth:environment_loaded', {
    services: registry.list(),
    storage: environment.OAUTH2_TOKEN_STORAGE,
  });

  return OAuth2Manager.create({
    tokenStore: TokenStoreFactory.create(
      environment.OAUTH2_TOKEN_STORAGE,
      environment.OAUTH2_TOKEN_STORE,
    ),
    requestTimeoutMs: environment.OAUTH2_REQUEST_TIMEOUT_MS,
    expiryLeewaySeconds: environment.OAUTH2_EXPIRY_LEEWAY_SECONDS,
    ...overrides,
    registry,
  });
}
