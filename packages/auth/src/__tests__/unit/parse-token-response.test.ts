import { describe, it, expect } from 'vitest';
import type { OAuth2Token } from '@multi-oauth/models';
import {
  isTokenExpired,
  mergeRefreshedToken,
  parseTokenResponse,
} from '../../utils/token/parse-token-response.js';

const NOW = new Date('2025-01-01T12:00:00.000Z');

describe('parseTokenResponse', () => {
  it('computes the absolute expiry', () => {
    expect(
      parseTokenResponse(
        { access_token: 'tok1', refresh_token: 'ref1', expires_in: 3600, scope: 'read' },
        NOW,
      ),
    ).toEqual({
      accessToken: 'tok1',
      refreshToken: 'ref1',
      expiresAt: new Date('2025-01-01T13:00:00.000Z'),
      tokenType: 'Bearer',
      scope: 'read',
    });
  });

  it('leaves tokens without expires_in unbounded', () => {
    const token = parseTokenResponse({ access_token: 'tok1', token_type: 'MAC' }, NOW);

    expect(token.expiresAt).toBeUndefined();
    expect(token.tokenType).toBe('MAC');
  });
});

describe('mergeRefreshedToken', () => {
  const previous: OAuth2Token = {
    accessToken: 'tok1',
    refreshToken: 'ref1',
    expiresAt: new Date('2025-01-01T11:59:59.000Z'),
    tokenType: 'Bearer',
    scope: 'read',
  };

  it('keeps the refresh token when none is returned', () => {
    expect(mergeRefreshedToken(previous, { access_token: 'tok2', expires_in: 3600 }, NOW)).toEqual({
      accessToken: 'tok2',
      refreshToken: 'ref1',
      expiresAt: new Date('2025-01-01T13:00:00.000Z'),
      tokenType: 'Bearer',
      scope: 'read',
    });
  });

  it('takes a rotated refresh token, type and scope', () => {
    const merged = mergeRefreshedToken(
      previous,
      { access_token: 'tok2', refresh_token: 'ref2', token_type: 'bearer', scope: 'read write' },
      NOW,
    );

    expect(merged.refreshToken).toBe('ref2');
    expect(merged.tokenType).toBe('bearer');
    expect(merged.scope).toBe('read write');
    expect(merged.expiresAt).toBeUndefined();
  });
});

describe('isTokenExpired', () => {
  const token: OAuth2Token = {
    accessToken: 'tok1',
    expiresAt: new Date('2025-01-01T12:00:00.000Z'),
    tokenType: 'Bearer',
  };

  it('treats the expiry instant itself as expired', () => {
    expect(isTokenExpired(token, new Date('2025-01-01T11:59:59.999Z'))).toBe(false);
    expect(isTokenExpired(token, NOW)).toBe(true);
  });

  it('applies the leeway', () => {
    expect(isTokenExpired(token, new Date('2025-01-01T11:59:00.000Z'), 60)).toBe(true);
    expect(isTokenExpired(token, new Date('2025-01-01T11:58:59.999Z'), 60)).toBe(false);
  });

  it('never expires tokens without expiry', () => {
    expect(isTokenExpired({ accessToken: 'tok1', tokenType: 'Bearer' }, new Date(8.64e15))).toBe(
      false,
    );
  });
});
