/**
 * Standard OAuth2 error codes as defined in RFC 6749
 */
export enum OAuth2ErrorCode {
  INVALID_REQUEST = 'invalid_request',
  INVALID_CLIENT = 'invalid_client',
  INVALID_GRANT = 'invalid_grant',
  UNAUTHORIZED_CLIENT = 'unauthorized_client',
  UNSUPPORTED_GRANT_TYPE = 'unsupported_grant_type',
  INVALID_SCOPE = 'invalid_scope',
  ACCESS_DENIED = 'access_denied',
  UNSUPPORTED_RESPONSE_TYPE = 'unsupported_response_type',
  SERVER_ERROR = 'server_error',
  TEMPORARILY_UNAVAILABLE = 'temporarily_unavailable',
}

/**
 * Client-side error codes beyond the OAuth2 set
 */
export enum AuthErrorCode {
  CONFIGURATION_ERROR = 'configuration_error',
  STATE_MISMATCH = 'state_mismatch',
  TOKEN_EXCHANGE_FAILED = 'token_exchange_failed',
  REFRESH_FAILED = 'refresh_failed',
  PERSISTENCE_FAILED = 'persistence_failed',
  MISSING_TOKEN = 'missing_token',
  NETWORK_ERROR = 'network_error',
  UNKNOWN_ERROR = 'unknown_error',
}

export type ErrorCode = OAuth2ErrorCode | AuthErrorCode;

/**
 * Maps an error string received from an authorization server onto
 * {@link OAuth2ErrorCode}. Unknown codes map to `UNKNOWN_ERROR`, or
 * `SERVER_ERROR` for 5xx responses.
 */
export function toErrorCode(error: string, statusCode?: number): ErrorCode {
  const known = Object.values(OAuth2ErrorCode).find((code) => code === error);
  if (known) {
    return known;
  }
  return statusCode !== undefined && statusCode >= 500
    ? OAuth2ErrorCode.SERVER_ERROR
    : AuthErrorCode.UNKNOWN_ERROR;
}

/**
 * Base class of every error this package throws.
 * Never exposes tokens or client secrets in its message.
 */
export class AuthenticationError extends Error {
  public readonly code: ErrorCode;
  public readonly cause?: Error;

  public constructor(message: string, code: ErrorCode = AuthErrorCode.UNKNOWN_ERROR, cause?: Error) {
    super(AuthenticationError.sanitizeMessage(message));
    this.name = 'AuthenticationError';
    this.code = code;
    this.cause = cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Removes token-like values from a message
   */
  protected static sanitizeMessage(message: string): string {
    return message
      .replace(/\b[a-zA-Z0-9+/]{20,}={0,2}\b/g, '[REDACTED_TOKEN]') // Base64-like tokens
      .replace(/\bBearer\s+[a-zA-Z0-9._-]+/gi, 'Bearer [REDACTED]')
      .replace(/\baccess_token[=:]\s*[^\s&]+/gi, 'access_token=[REDACTED]')
      .replace(/\brefresh_token[=:]\s*[^\s&]+/gi, 'refresh_token=[REDACTED]')
      .replace(/\bclient_secret[=:]\s*[^\s&]+/gi, 'client_secret=[REDACTED]')
      .replace(/\bcode_verifier[=:]\s*[^\s&]+/gi, 'code_verifier=[REDACTED]');
  }

  /**
   * Raised when credentials are requested for a service without a token
   */
  public static missingToken(serviceName: string): AuthenticationError {
    return new AuthenticationError(
      `No access token available for service '${serviceName}'`,
      AuthErrorCode.MISSING_TOKEN,
    );
  }

  /**
   * Raised for a malformed authorization callback
   */
  public static invalidRequest(description: string): AuthenticationError {
    return new AuthenticationError(
      `Invalid OAuth2 request: ${description}`,
      OAuth2ErrorCode.INVALID_REQUEST,
    );
  }

  /**
   * Raised when the authorization server redirected back with an `error`
   */
  public static authorizationDenied(error: string, description?: string): AuthenticationError {
    const message = description
      ? `Authorization failed: ${error} - ${description}`
      : `Authorization failed: ${error}`;
    return new AuthenticationError(message, toErrorCode(error));
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}
