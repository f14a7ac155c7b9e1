/**
 * On-disk form of a single token. Absent optional values are written as
 * `null`; `expires_at` is an ISO-8601 instant.
 */
export interface PersistedTokenRecord {
  access_token: string;
  refresh_token: string | null;
  expires_at: string | null;
  token_type: string;
  scope: string | null;
}

/**
 * On-disk token file: service name to token record
 */
export type PersistedTokenFile = Record<string, PersistedTokenRecord>;
