import { randomBytes } from 'crypto';

/**
 * Generates a correlation id for one outbound token request.
 *
 * Format: `[prefix_]timestamp_randomhex`.
 * @public
 */
export function generateRequestId(prefix?: string): string {
  const timestamp = Date.now();
  const randomSuffix = randomBytes(4).toString('hex');
  return `${prefix ? `${prefix}_` : ''}${timestamp}_${randomSuffix}`;
}
