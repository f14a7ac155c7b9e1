/**
 * Tests for pino-setup redaction
 *
 * Verifies that tokens, secrets and PKCE material never reach log output
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type pino from 'pino';
import { createRootLogger, rootLogger } from './pino-setup.js';
import { logEvent, logError } from '../logger.js';

describe('Pino Redaction', () => {
  let testLogger: pino.Logger;
  let logs: string[];

  beforeEach(() => {
    logs = [];
    testLogger = createRootLogger({
      write: (msg: string) => {
        logs.push(msg);
      },
    });
    testLogger.level = 'info';
  });

  const lastLine = (): Record<string, unknown> => JSON.parse(logs[logs.length - 1]);

  describe('OAuth2 credentials', () => {
    it('redacts access_token and refresh_token', () => {
      testLogger.info({ access_token: 'tok1', refresh_token: 'ref1' });

      const logged = lastLine();
      expect(logged.access_token).toBe('[REDACTED]');
      expect(logged.refresh_token).toBe('[REDACTED]');
    });

    it('redacts nested client secrets', () => {
      testLogger.info({ config: { clientSecret: 'test-secret', clientId: 'client-1' } });

      const logged = lastLine();
      expect(logged.config).toEqual({ clientSecret: '[REDACTED]', clientId: 'client-1' });
    });

    it('redacts authorization codes, verifiers and state', () => {
      testLogger.info({ code: 'abc123', code_verifier: 'verifier', state: 'state-1' });

      const logged = lastLine();
      expect(logged.code).toBe('[REDACTED]');
      expect(logged.code_verifier).toBe('[REDACTED]');
      expect(logged.state).toBe('[REDACTED]');
    });

    it('keeps non-sensitive fields', () => {
      testLogger.info({ serviceName: 'hubspot', status: 400 });

      const logged = lastLine();
      expect(logged.serviceName).toBe('hubspot');
      expect(logged.status).toBe(400);
    });
  });

  it('is silent unless a level is configured', () => {
    const quiet = createRootLogger({
      write: (msg: string) => {
        logs.push(msg);
      },
    });
    quiet.info({ serviceName: 'slack' });

    expect(quiet.level).toBe('silent');
    expect(logs).toHaveLength(0);
  });
});

describe('logEvent', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes the event name as field and message', () => {
    const spy = vi.spyOn(rootLogger, 'warn');

    logEvent('warn', 'auth:token_persist_failed', { serviceName: 'calendly' });

    expect(spy).toHaveBeenCalledWith(
      { event: 'auth:token_persist_failed', serviceName: 'calendly' },
      'auth:token_persist_failed',
    );
  });

  it('logError records message and error name', () => {
    const spy = vi.spyOn(rootLogger, 'error');
    const error = new TypeError('bad input');

    logError('token-store', error, { serviceName: 'zendesk' });

    expect(spy).toHaveBeenCalledWith(
      {
        event: 'error:token-store',
        serviceName: 'zendesk',
        errorName: 'TypeError',
        message: 'bad input',
        stack: error.stack,
      },
      'error:token-store',
    );
  });
});
