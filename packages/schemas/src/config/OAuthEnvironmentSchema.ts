import { z } from 'zod';
import { TokenStorageTypeSchema } from './TokenStorageTypeSchema.js';

// Unset and blank variables both count as absent
const OptionalEnvString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const EnvFlag = z
  .string()
  .optional()
  .transform((value) => value?.trim().toLowerCase() === 'true');

export const DEFAULT_REDIRECT_BASE_URI = 'http://localhost:8000/oauth/callback';
export const DEFAULT_TOKEN_STORE_PATH = '.oauth_tokens.json';
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * Process environment understood by the OAuth2 manager.
 *
 * Unknown variables are stripped, so the whole `process.env` can be parsed.
 */
export const OAuthEnvironmentSchema = z.object({
  OAUTH_REDIRECT_URI: z.string().url().default(DEFAULT_REDIRECT_BASE_URI),
  OAUTH2_TOKEN_STORE: z.string().min(1).default(DEFAULT_TOKEN_STORE_PATH),
  OAUTH2_TOKEN_STORAGE: TokenStorageTypeSchema.default('auto'),
  OAUTH2_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  OAUTH2_EXPIRY_LEEWAY_SECONDS: z.coerce.number().int().nonnegative().default(0),

  SALESFORCE_CLIENT_ID: OptionalEnvString,
  SALESFORCE_CLIENT_SECRET: OptionalEnvString,
  SALESFORCE_SANDBOX: EnvFlag,

  SHOPIFY_CLIENT_ID: OptionalEnvString,
  SHOPIFY_CLIENT_SECRET: OptionalEnvString,
  SHOPIFY_SHOP_DOMAIN: OptionalEnvString,

  HUBSPOT_CLIENT_ID: OptionalEnvString,
  HUBSPOT_CLIENT_SECRET: OptionalEnvString,

  SLACK_CLIENT_ID: OptionalEnvString,
  SLACK_CLIENT_SECRET: OptionalEnvString,

  CALENDLY_CLIENT_ID: OptionalEnvString,
  CALENDLY_CLIENT_SECRET: OptionalEnvString,

  ZENDESK_CLIENT_ID: OptionalEnvString,
  ZENDESK_CLIENT_SECRET: OptionalEnvString,
  ZENDESK_SUBDOMAIN: OptionalEnvString,
});
