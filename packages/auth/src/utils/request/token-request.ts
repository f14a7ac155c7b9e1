/**
 * Token endpoint requests for the authorization code and refresh token grants
 */
import type { ServiceConfig } from '@multi-oauth/models';
import { GrantTypes } from '@multi-oauth/models';
import { logEvent } from '@multi-oauth/core';
import type { TokenRequestFailure } from '../../errors/oauth2-errors.js';
import { TokenResponseSchema, type TokenResponseZod } from '../../schemas.js';
import { parseErrorResponse } from '../error/parse-error-response.js';
import { err, ok, type Result } from '../result.js';

export const TOKEN_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'application/x-www-form-urlencoded',
  Accept: 'application/json',
};

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface TokenRequestOptions {
  fetch: FetchLike;
  timeoutMs: number;
  /** Caller cancellation, combined with the timeout */
  signal?: AbortSignal;
  /** Correlation id for log events */
  requestId: string;
}

export type TokenRequestResult = Result<TokenResponseZod, TokenRequestFailure>;

/**
 * Form body of an authorization code exchange. The client secret travels in
 * the body, not in an Authorization header.
 * @internal
 */
export function buildAuthorizationCodeBody(
  config: ServiceConfig,
  code: string,
  codeVerifier: string,
): URLSearchParams {
  return new URLSearchParams({
    grant_type: GrantTypes.AUTHORIZATION_CODE,
    client_id: config.clientId,
    client_secret: config.clientSecret,
    code,
    redirect_uri: config.redirectUri,
    code_verifier: codeVerifier,
  });
}

/**
 * Form body of a refresh token grant.
 * @internal
 */
export function buildRefreshTokenBody(config: ServiceConfig, refreshToken: string): URLSearchParams {
  return new URLSearchParams({
    grant_type: GrantTypes.REFRESH_TOKEN,
    client_id: config.clientId,
    client_secret: config.clientSecret,
    refresh_token: refreshToken,
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * POSTs a grant to the token endpoint and validates the JSON answer.
 *
 * Never throws. Network errors, timeouts and caller aborts come back as
 * `transport` failures; non-2xx responses, bodies that are not JSON and
 * bodies without `access_token` as `protocol` failures. Nothing is retried:
 * authorization codes are single-use.
 * @public
 */
export async function requestToken(
  tokenEndpoint: string,
  body: URLSearchParams,
  options: TokenRequestOptions,
): Promise<TokenRequestResult> {
  const { signal, timeoutMs, requestId } = options;

  if (signal?.aborted) {
    return err({ kind: 'transport', message: 'Request aborted before it was sent' });
  }

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const onCallerAbort = (): void => controller.abort();
  signal?.addEventListener('abort', onCallerAbort, { once: true });

  logEvent('debug', 'auth:token_request_started', {
    requestId,
    tokenEndpoint,
    grantType: body.get('grant_type'),
  });

  try {
    const response = await options.fetch(tokenEndpoint, {
      method: 'POST',
      headers: { ...TOKEN_REQUEST_HEADERS },
      body: body.toString(),
      signal: controller.signal,
    });
    const text = await response.text();
    return readTokenResponse(response, text);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    if (controller.signal.aborted) {
      const message = signal?.aborted
        ? 'Request aborted'
        : `Token endpoint did not respond within ${timeoutMs} ms`;
      return err({ kind: 'transport', message, cause });
    }
    return err({
      kind: 'transport',
      message: `Token endpoint request failed: ${errorMessage(error)}`,
      cause,
    });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onCallerAbort);
  }
}

function readTokenResponse(response: Response, text: string): TokenRequestResult {
  if (!response.ok) {
    const oauthError = parseErrorResponse(text);
    const detail = oauthError
      ? `: ${oauthError.error}${oauthError.error_description ? ` - ${oauthError.error_description}` : ''}`
      : '';
    return err({
      kind: 'protocol',
      message: `Token endpoint responded with HTTP ${response.status}${detail}`,
      status: response.status,
      oauthError: oauthError?.error,
      oauthErrorDescription: oauthError?.error_description,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return err({
      kind: 'protocol',
      message: 'Token response is not valid JSON',
      status: response.status,
      cause: error instanceof Error ? error : undefined,
    });
  }

  const parsed = TokenResponseSchema.safeParse(data);
  if (!parsed.success) {
    const missingAccessToken =
      typeof data !== 'object' || data === null || !('access_token' in data);
    return err({
      kind: 'protocol',
      message: missingAccessToken
        ? 'Token response is missing access_token'
        : `Token response is invalid: ${parsed.error.issues.map((issue) => issue.path.join('.')).join(', ')}`,
      status: response.status,
    });
  }

  return ok(parsed.data);
}
