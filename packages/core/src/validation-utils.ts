/**
 * Shared validation helpers for service configuration.
 *
 * Every failure throws a plain `Error` whose message starts with the
 * supplied context, so callers can wrap it in their own error type.
 * @public
 */

const SAFE_SERVICE_NAME_REGEX = /^[a-zA-Z0-9._-]+$/;

function prefix(context?: string): string {
  return context ? `${context}: ` : '';
}

/**
 * Requires an absolute http(s) URL.
 * @throws \{Error\} When the URL is empty, unparseable or uses another scheme
 * @internal
 */
function validateUrl(url: string, context?: string): void {
  if (!url) {
    throw new Error(`${prefix(context)}URL is required`);
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new Error(`${prefix(context)}Invalid URL format: ${url}`);
  }

  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new Error(`${prefix(context)}Unsupported URL scheme: ${parsed.protocol}`);
  }
}

/**
 * Collection of validation utility functions.
 * @example
 * ```typescript
 * ValidationUtils.validateUrl('https://auth.example.com/token', 'tokenEndpoint');
 * ValidationUtils.validateRequired(config, ['clientId', 'clientSecret'], 'ServiceConfig');
 * ```
 * @public
 */
export const ValidationUtils = {
  validateUrl,

  /**
   * Service names become path segments of redirect URIs and keys of the
   * persisted token file.
   * @throws \{Error\} When the name is empty or contains other characters than
   * letters, digits, dots, underscores and hyphens
   */
  validateServiceName: (serviceName: string): string => {
    if (!SAFE_SERVICE_NAME_REGEX.test(serviceName)) {
      throw new Error(
        `Invalid service name: ${serviceName}. Only alphanumeric characters, dots, underscores, and hyphens are allowed.`,
      );
    }
    return serviceName;
  },

  /**
   * Checks that each listed field is a non-empty value.
   * @throws \{Error\} Naming the first missing field
   */
  validateRequired: <T extends object>(
    config: T,
    fields: readonly (keyof T & string)[],
    context?: string,
  ): void => {
    for (const field of fields) {
      const value = config[field];
      if (value === undefined || value === null || value === '') {
        throw new Error(`${prefix(context)}Missing required field: ${field}`);
      }
    }
  },

  /** Validates the authorization, token and redirect URLs of a service. */
  validateOAuthUrls: (urls: {
    authorizationEndpoint: string;
    tokenEndpoint: string;
    redirectUri: string;
  }): void => {
    validateUrl(urls.authorizationEndpoint, 'authorizationEndpoint');
    validateUrl(urls.tokenEndpoint, 'tokenEndpoint');
    validateUrl(urls.redirectUri, 'redirectUri');
  },
};
