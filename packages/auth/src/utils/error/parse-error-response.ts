import type { OAuthError } from '@multi-oauth/models';
import { OAuthErrorResponseSchema } from '../../schemas.js';

/**
 * Extracts an OAuth2 error (RFC 6749 section 5.2) from a failed token
 * endpoint response body.
 *
 * Returns `undefined` when the body is not JSON or carries no `error`
 * field; callers then fall back to the HTTP status.
 * @param body - Raw response body
 * @public
 */
export function parseErrorResponse(body: string): OAuthError | undefined {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return undefined;
  }

  const parsed = OAuthErrorResponseSchema.safeParse(data);
  return parsed.success ? parsed.data : undefined;
}
