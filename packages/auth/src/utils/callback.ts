import type { AuthorizationCallback } from '@multi-oauth/models';
import { AuthenticationError } from '../errors/authentication-error.js';

/**
 * Query parameters as delivered by common HTTP frameworks
 */
export type CallbackQuery =
  | URLSearchParams
  | Record<string, string | readonly string[] | undefined>;

function first(query: CallbackQuery, name: string): string | undefined {
  if (query instanceof URLSearchParams) {
    return query.get(name) ?? undefined;
  }
  const value = query[name];
  if (typeof value === 'string') {
    return value;
  }
  return value?.[0];
}

/**
 * Validates the query of an authorization redirect.
 *
 * @throws {AuthenticationError} carrying the server's error code when the
 * redirect reports an `error`, or `invalid_request` when `code` or `state`
 * is missing
 * @public
 */
export function parseCallbackParams(query: CallbackQuery): AuthorizationCallback {
  const error = first(query, 'error');
  if (error) {
    throw AuthenticationError.authorizationDenied(error, first(query, 'error_description'));
  }

  const code = first(query, 'code');
  if (!code) {
    throw AuthenticationError.invalidRequest('missing code parameter');
  }

  const state = first(query, 'state');
  if (!state) {
    throw AuthenticationError.invalidRequest('missing state parameter');
  }

  return { code, state };
}
