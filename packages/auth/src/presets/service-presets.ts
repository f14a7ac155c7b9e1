/**
 * Endpoint and scope presets for the supported third-party services.
 */
import type { ServiceConfig } from '@multi-oauth/models';

export const SERVICE_NAMES = [
  'salesforce',
  'shopify',
  'hubspot',
  'slack',
  'calendly',
  'zendesk',
] as const;

export type PresetServiceName = (typeof SERVICE_NAMES)[number];

// Accepts `shop.myshopify.com`, `https://shop.myshopify.com/` and the like
function hostOf(value: string): string {
  return value.replace(/^https?:\/\//i, '').replace(/\/+$/, '');
}

/**
 * @param isSandbox - Use the sandbox login host `test.salesforce.com`
 */
export function salesforce(
  clientId: string,
  clientSecret: string,
  redirectUri: string,
  isSandbox = false,
): ServiceConfig {
  const baseUrl = isSandbox ? 'https://test.salesforce.com' : 'https://login.salesforce.com';
  return {
    serviceName: 'salesforce',
    clientId,
    clientSecret,
    authorizationEndpoint: `${baseUrl}/services/oauth2/authorize`,
    tokenEndpoint: `${baseUrl}/services/oauth2/token`,
    redirectUri,
    scope: 'api refresh_token offline_access',
  };
}

/**
 * @param shopDomain - Store host, e.g. `demo.myshopify.com`
 */
export function shopify(
  clientId: string,
  clientSecret: string,
  redirectUri: string,
  shopDomain: string,
): ServiceConfig {
  const shop = hostOf(shopDomain);
  return {
    serviceName: 'shopify',
    clientId,
    clientSecret,
    authorizationEndpoint: `https://${shop}/admin/oauth/authorize`,
    tokenEndpoint: `https://${shop}/admin/oauth/access_token`,
    redirectUri,
    scope: 'read_orders,write_orders,read_products,write_products,read_customers,write_customers',
  };
}

export function hubspot(clientId: string, clientSecret: string, redirectUri: string): ServiceConfig {
  return {
    serviceName: 'hubspot',
    clientId,
    clientSecret,
    authorizationEndpoint: 'https://app.hubspot.com/oauth/authorize',
    tokenEndpoint: 'https://api.hubapi.com/oauth/v1/token',
    redirectUri,
    scope: 'contacts,crm.objects.contacts.read,crm.objects.contacts.write',
  };
}

export function slack(clientId: string, clientSecret: string, redirectUri: string): ServiceConfig {
  return {
    serviceName: 'slack',
    clientId,
    clientSecret,
    authorizationEndpoint: 'https://slack.com/oauth/v2/authorize',
    tokenEndpoint: 'https://slack.com/api/oauth.v2.access',
    redirectUri,
    scope: 'chat:write,channels:read,files:write',
  };
}

export function calendly(clientId: string, clientSecret: string, redirectUri: string): ServiceConfig {
  return {
    serviceName: 'calendly',
    clientId,
    clientSecret,
    authorizationEndpoint: 'https://auth.calendly.com/oauth/authorize',
    tokenEndpoint: 'https://auth.calendly.com/oauth/token',
    redirectUri,
    scope: 'default',
  };
}

/**
 * @param subdomain - Account subdomain, `acme` for `acme.zendesk.com`
 */
export function zendesk(
  clientId: string,
  clientSecret: string,
  redirectUri: string,
  subdomain: string,
): ServiceConfig {
  return {
    serviceName: 'zendesk',
    clientId,
    clientSecret,
    authorizationEndpoint: `https://${subdomain}.zendesk.com/oauth/authorizations/new`,
    tokenEndpoint: `https://${subdomain}.zendesk.com/oauth/tokens`,
    redirectUri,
    scope: 'read write',
  };
}

export const ServicePresets = {
  salesforce,
  shopify,
  hubspot,
  slack,
  calendly,
  zendesk,
} as const;
