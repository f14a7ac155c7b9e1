import { describe, it, expect } from 'vitest';
import { parseCallbackParams } from '../../utils/callback.js';
import { AuthenticationError, OAuth2ErrorCode } from '../../errors/authentication-error.js';

describe('parseCallbackParams', () => {
  it('returns code and state from a query record', () => {
    expect(parseCallbackParams({ code: 'abc123', state: 'state-1' })).toEqual({
      code: 'abc123',
      state: 'state-1',
    });
  });

  it('reads URLSearchParams and repeated parameters', () => {
    expect(parseCallbackParams(new URLSearchParams('code=abc123&state=state-1'))).toEqual({
      code: 'abc123',
      state: 'state-1',
    });
    expect(parseCallbackParams({ code: ['first', 'second'], state: 'state-1' }).code).toBe('first');
  });

  it('rejects a redirect that reports an error', () => {
    let caught: unknown;
    try {
      parseCallbackParams({
        error: 'access_denied',
        error_description: 'User cancelled',
        state: 'state-1',
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AuthenticationError);
    expect(caught).toMatchObject({
      code: OAuth2ErrorCode.ACCESS_DENIED,
      message: 'Authorization failed: access_denied - User cancelled',
    });
  });

  it('rejects missing code or state', () => {
    expect(() => parseCallbackParams({ state: 'state-1' })).toThrow(
      'Invalid OAuth2 request: missing code parameter',
    );
    expect(() => parseCallbackParams({ code: 'abc123', state: '' })).toThrow(
      'Invalid OAuth2 request: missing state parameter',
    );
  });
});
