import type { ServiceConfig } from '@multi-oauth/models';
import { logEvent, resolveEnvVar, ValidationUtils } from '@multi-oauth/core';
import { ConfigurationError } from '../errors/oauth2-errors.js';

const REQUIRED_FIELDS = [
  'serviceName',
  'clientId',
  'clientSecret',
  'authorizationEndpoint',
  'tokenEndpoint',
  'redirectUri',
] as const;

/**
 * Immutable per-service OAuth2 configuration, keyed by service name.
 *
 * String fields may reference the environment as `${VAR}` or
 * `${VAR:default}`; references are resolved once, at registration.
 * @public
 */
export class ServiceConfigRegistry {
  private readonly configs = new Map<string, Readonly<ServiceConfig>>();

  /**
   * @param envSource - Environment used for `${VAR}` resolution
   */
  public constructor(private readonly envSource: Record<string, string | undefined> = process.env) {}

  /**
   * Validates and stores a configuration, replacing any previous one for
   * the same service.
   * @throws {ConfigurationError} When a field is missing, a URL is invalid or
   * an environment reference cannot be resolved
   */
  public register(config: ServiceConfig): Readonly<ServiceConfig> {
    const resolved = this.resolve(config);

    try {
      ValidationUtils.validateServiceName(resolved.serviceName);
      ValidationUtils.validateRequired(resolved, REQUIRED_FIELDS, 'ServiceConfig');
      ValidationUtils.validateOAuthUrls(resolved);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid configuration for service '${config.serviceName}': ${error instanceof Error ? error.message : String(error)}`,
        config.serviceName,
        error instanceof Error ? error : undefined,
      );
    }

    const frozen = Object.freeze(resolved);
    const replaced = this.configs.has(frozen.serviceName);
    this.configs.set(frozen.serviceName, frozen);

    logEvent('info', 'auth:service_registered', {
      serviceName: frozen.serviceName,
      replaced,
    });
    return frozen;
  }

  /**
   * @throws {ConfigurationError} When the service is not registered
   */
  public get(serviceName: string): Readonly<ServiceConfig> {
    const config = this.configs.get(serviceName);
    if (!config) {
      throw ConfigurationError.notRegistered(serviceName);
    }
    return config;
  }

  public has(serviceName: string): boolean {
    return this.configs.has(serviceName);
  }

  /** Registered service names in registration order */
  public list(): string[] {
    return [...this.configs.keys()];
  }

  public unregister(serviceName: string): boolean {
    return this.configs.delete(serviceName);
  }

  private resolve(config: ServiceConfig): ServiceConfig {
    const field = (value: string): string => resolveEnvVar(value, this.envSource);
    try {
      return {
        serviceName: config.serviceName,
        clientId: field(config.clientId),
        clientSecret: field(config.clientSecret),
        authorizationEndpoint: field(config.authorizationEndpoint),
        tokenEndpoint: field(config.tokenEndpoint),
        redirectUri: field(config.redirectUri),
        scope: field(config.scope),
      };
    } catch (error) {
      throw new ConfigurationError(
        `Cannot resolve configuration for service '${config.serviceName}': ${error instanceof Error ? error.message : String(error)}`,
        config.serviceName,
        error instanceof Error ? error : undefined,
      );
    }
  }
}
