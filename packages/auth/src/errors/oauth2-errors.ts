import { AuthErrorCode, AuthenticationError, type ErrorCode, toErrorCode } from './authentication-error.js';

/**
 * How a token endpoint call failed: `transport` for network errors and
 * timeouts, `protocol` for non-2xx responses and unusable bodies.
 */
export type TokenRequestFailureKind = 'transport' | 'protocol';

/**
 * Failure details shared by {@link TokenExchangeError} and {@link RefreshError}
 */
export interface TokenRequestFailure {
  kind: TokenRequestFailureKind;
  message: string;
  /** HTTP status, when a response was received */
  status?: number;
  /** `error` field of an OAuth2 error body */
  oauthError?: string;
  oauthErrorDescription?: string;
  cause?: Error;
}

function failureCode(failure: TokenRequestFailure, fallback: AuthErrorCode): ErrorCode {
  if (failure.oauthError) {
    return toErrorCode(failure.oauthError, failure.status);
  }
  return failure.kind === 'transport' ? AuthErrorCode.NETWORK_ERROR : fallback;
}

/**
 * Unknown service, invalid service configuration or invalid environment
 */
export class ConfigurationError extends AuthenticationError {
  public readonly serviceName?: string;

  public constructor(message: string, serviceName?: string, cause?: Error) {
    super(message, AuthErrorCode.CONFIGURATION_ERROR, cause);
    this.name = 'ConfigurationError';
    this.serviceName = serviceName;
  }

  public static notRegistered(serviceName: string): ConfigurationError {
    return new ConfigurationError(`Service '${serviceName}' is not registered`, serviceName);
  }
}

/**
 * No pending authorization matches the callback state: forged, replayed,
 * expired or belonging to another service
 */
export class StateMismatchError extends AuthenticationError {
  public readonly serviceName: string;

  public constructor(serviceName: string) {
    super(
      `No pending authorization for service '${serviceName}' matches the returned state`,
      AuthErrorCode.STATE_MISMATCH,
    );
    this.name = 'StateMismatchError';
    this.serviceName = serviceName;
  }
}

/**
 * The authorization code could not be exchanged for a token
 */
export class TokenExchangeError extends AuthenticationError {
  public readonly serviceName: string;
  public readonly failure: TokenRequestFailureKind;
  public readonly status?: number;
  public readonly oauthError?: string;

  public constructor(serviceName: string, failure: TokenRequestFailure) {
    super(
      `Token exchange failed for service '${serviceName}': ${failure.message}`,
      failureCode(failure, AuthErrorCode.TOKEN_EXCHANGE_FAILED),
      failure.cause,
    );
    this.name = 'TokenExchangeError';
    this.serviceName = serviceName;
    this.failure = failure.kind;
    this.status = failure.status;
    this.oauthError = failure.oauthError;
  }
}

export type RefreshFailureReason = 'no_token' | 'no_refresh_token' | 'request_failed';

/**
 * The access token could not be refreshed. The stale token stays stored.
 */
export class RefreshError extends AuthenticationError {
  public readonly serviceName: string;
  public readonly reason: RefreshFailureReason;
  public readonly failure?: TokenRequestFailureKind;
  public readonly status?: number;
  public readonly oauthError?: string;

  private constructor(
    serviceName: string,
    reason: RefreshFailureReason,
    message: string,
    code: ErrorCode,
    failure?: TokenRequestFailure,
  ) {
    super(message, code, failure?.cause);
    this.name = 'RefreshError';
    this.serviceName = serviceName;
    this.reason = reason;
    this.failure = failure?.kind;
    this.status = failure?.status;
    this.oauthError = failure?.oauthError;
  }

  public static noToken(serviceName: string): RefreshError {
    return new RefreshError(
      serviceName,
      'no_token',
      `No token stored for service '${serviceName}'`,
      AuthErrorCode.MISSING_TOKEN,
    );
  }

  public static noRefreshToken(serviceName: string): RefreshError {
    return new RefreshError(
      serviceName,
      'no_refresh_token',
      `Token for service '${serviceName}' has no refresh token`,
      AuthErrorCode.REFRESH_FAILED,
    );
  }

  public static requestFailed(serviceName: string, failure: TokenRequestFailure): RefreshError {
    return new RefreshError(
      serviceName,
      'request_failed',
      `Token refresh failed for service '${serviceName}': ${failure.message}`,
      failureCode(failure, AuthErrorCode.REFRESH_FAILED),
      failure,
    );
  }
}

/**
 * Writing the token file failed. Reported through the store's error hook,
 * never thrown to callers.
 */
export class PersistenceError extends AuthenticationError {
  public readonly path?: string;

  public constructor(message: string, path?: string, cause?: Error) {
    super(message, AuthErrorCode.PERSISTENCE_FAILED, cause);
    this.name = 'PersistenceError';
    this.path = path;
  }
}
