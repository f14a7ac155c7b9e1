/**
 * OAuth2 endpoint and credential configuration of one third-party service.
 *
 * Created once at startup and never mutated; the registry freezes every
 * config it accepts.
 */
export interface ServiceConfig {
  /** Registry key, e.g. `salesforce` */
  serviceName: string;
  clientId: string;
  clientSecret: string;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  redirectUri: string;
  /** Requested scope string, sent verbatim */
  scope: string;
}
