import type { OAuth2Token, PersistedTokenFile, PersistedTokenRecord } from '@multi-oauth/models';
import type { PersistedTokenFileZod } from '../schemas.js';

export function cloneToken(token: OAuth2Token): OAuth2Token {
  return {
    ...token,
    expiresAt: token.expiresAt ? new Date(token.expiresAt.getTime()) : undefined,
  };
}

export function serializeToken(token: OAuth2Token): PersistedTokenRecord {
  return {
    access_token: token.accessToken,
    refresh_token: token.refreshToken ?? null,
    expires_at: token.expiresAt ? token.expiresAt.toISOString() : null,
    token_type: token.tokenType,
    scope: token.scope ?? null,
  };
}

export function deserializeToken(record: PersistedTokenRecord): OAuth2Token {
  return {
    accessToken: record.access_token,
    refreshToken: record.refresh_token ?? undefined,
    expiresAt: record.expires_at ? new Date(record.expires_at) : undefined,
    tokenType: record.token_type,
    scope: record.scope ?? undefined,
  };
}

export function serializeTokens(tokens: ReadonlyMap<string, OAuth2Token>): PersistedTokenFile {
  const file: PersistedTokenFile = {};
  for (const [serviceName, token] of tokens) {
    file[serviceName] = serializeToken(token);
  }
  return file;
}

export function deserializeTokens(file: PersistedTokenFileZod): Map<string, OAuth2Token> {
  const tokens = new Map<string, OAuth2Token>();
  for (const [serviceName, record] of Object.entries(file)) {
    tokens.set(serviceName, deserializeToken(record));
  }
  return tokens;
}
