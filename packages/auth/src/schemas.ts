/**
 * Zod schemas for data this package reads from outside the process:
 * token endpoint responses and the persisted token file.
 *
 * @public
 */

import { z } from 'zod';

const nullableString = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

/** Longest accepted `expires_in`, 100 years */
export const MAX_EXPIRES_IN_SECONDS = 100 * 365 * 24 * 60 * 60;

const expiresInSeconds = z
  .union([z.number(), z.string().regex(/^\d+(\.\d+)?$/).transform(Number)])
  .pipe(z.number().nonnegative().max(MAX_EXPIRES_IN_SECONDS));

/**
 * Successful token endpoint response. `expires_in` may arrive as a number or
 * a numeric string; fractional seconds are truncated. Negative values and
 * lifetimes above {@link MAX_EXPIRES_IN_SECONDS} are rejected. `null` fields
 * count as absent.
 *
 * @example
 * ```typescript
 * TokenResponseSchema.parse({ access_token: 'tok1', expires_in: '3600' });
 * // { access_token: 'tok1', expires_in: 3600, ... }
 * ```
 */
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: optionalString,
  expires_in: expiresInSeconds
    .nullish()
    .transform((value) => (value === null || value === undefined ? undefined : Math.trunc(value))),
  refresh_token: optionalString,
  scope: optionalString,
});

/**
 * OAuth2 error body (RFC 6749 section 5.2)
 */
export const OAuthErrorResponseSchema = z.object({
  error: z.string().min(1),
  error_description: optionalString,
  error_uri: optionalString,
});

/**
 * One entry of the persisted token file. Missing optional fields read as
 * `null`, a missing `token_type` as `Bearer`.
 */
export const PersistedTokenRecordSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: nullableString,
  expires_at: z
    .string()
    .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid ISO-8601 instant' })
    .nullish()
    .transform((value) => value ?? null),
  token_type: z.string().min(1).default('Bearer'),
  scope: nullableString,
});

export const PersistedTokenFileSchema = z.record(z.string(), PersistedTokenRecordSchema);

export type TokenResponseZod = z.infer<typeof TokenResponseSchema>;
export type OAuthErrorResponseZod = z.infer<typeof OAuthErrorResponseSchema>;
export type PersistedTokenFileZod = z.infer<typeof PersistedTokenFileSchema>;
