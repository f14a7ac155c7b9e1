import { describe, it, expect, afterEach } from 'vitest';
import { AuthenticationError } from '../../errors/authentication-error.js';
import { createTestManager, jsonResponse, type TestManagerContext } from '../test-utils.js';

describe('OAuth2Manager - valid tokens', () => {
  let context: TestManagerContext;

  afterEach(() => {
    context.manager.destroy();
  });

  it('returns undefined without a token', async () => {
    context = await createTestManager();

    await expect(context.manager.getValidToken('example')).resolves.toBeUndefined();
    await expect(context.manager.isAuthenticated('example')).resolves.toBe(false);
  });

  it('returns an unexpired token without a request', async () => {
    context = await createTestManager();
    await context.tokenStore.save('example', {
      accessToken: 'tok1',
      expiresAt: new Date('2025-01-01T12:00:01.000Z'),
      tokenType: 'Bearer',
    });

    const token = await context.manager.getValidToken('example');

    expect(token?.accessToken).toBe('tok1');
    expect(context.mockFetch).not.toHaveBeenCalled();
  });

  it('treats a token without expiry as valid', async () => {
    context = await createTestManager();
    await context.tokenStore.save('example', { accessToken: 'forever', tokenType: 'Bearer' });
    context.clock.advance(365 * 24 * 60 * 60 * 1000);

    await expect(context.manager.isAuthenticated('example')).resolves.toBe(true);
  });

  it('treats a token expiring exactly now as expired', async () => {
    context = await createTestManager();
    await context.tokenStore.save('example', {
      accessToken: 'tok1',
      refreshToken: 'ref1',
      expiresAt: new Date('2025-01-01T12:00:00.000Z'),
      tokenType: 'Bearer',
    });
    context.mockFetch.mockResolvedValueOnce(jsonResponse({ access_token: 'tok2' }));

    const token = await context.manager.getValidToken('example');

    expect(token?.accessToken).toBe('tok2');
    expect(context.mockFetch).toHaveBeenCalledTimes(1);
  });

  it('returns undefined when the refresh fails and keeps the stale token', async () => {
    context = await createTestManager();
    const stale = {
      accessToken: 'tok1',
      refreshToken: 'ref1',
      expiresAt: new Date('2025-01-01T11:00:00.000Z'),
      tokenType: 'Bearer',
    };
    await context.tokenStore.save('example', stale);
    context.mockFetch.mockRejectedValueOnce(new Error('connection refused'));

    await expect(context.manager.getValidToken('example')).resolves.toBeUndefined();
    expect(context.tokenStore.get('example')).toEqual(stale);
  });

  it('returns undefined for an expired token without refresh token', async () => {
    context = await createTestManager();
    await context.tokenStore.save('example', {
      accessToken: 'tok1',
      expiresAt: new Date('2025-01-01T11:00:00.000Z'),
      tokenType: 'Bearer',
    });

    await expect(context.manager.isAuthenticated('example')).resolves.toBe(false);
    expect(context.mockFetch).not.toHaveBeenCalled();
  });

  it('refreshes ahead of expiry with a leeway', async () => {
    context = await createTestManager({ expiryLeewaySeconds: 60 });
    await context.tokenStore.save('example', {
      accessToken: 'tok1',
      refreshToken: 'ref1',
      expiresAt: new Date('2025-01-01T12:00:30.000Z'),
      tokenType: 'Bearer',
    });
    context.mockFetch.mockResolvedValueOnce(jsonResponse({ access_token: 'tok2', expires_in: 3600 }));

    const token = await context.manager.getValidToken('example');

    expect(token?.accessToken).toBe('tok2');
  });

  describe('getAuthorizationHeaders', () => {
    it('uses the token type of the stored token', async () => {
      context = await createTestManager();
      await context.tokenStore.save('example', { accessToken: 'tok1', tokenType: 'bearer' });

      await expect(context.manager.getAuthorizationHeaders('example')).resolves.toEqual({
        Authorization: 'bearer tok1',
      });
    });

    it('fails without a valid token', async () => {
      context = await createTestManager();

      const error = await context.manager
        .getAuthorizationHeaders('example')
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({
        message: "No access token available for service 'example'",
      });
    });
  });
});
