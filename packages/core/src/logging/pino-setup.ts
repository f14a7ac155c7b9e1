/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Uses fast-redact (through pino's `redact` option) for path-based redaction
 * of tokens, client secrets, authorization codes and PKCE verifiers.
 */

import pino from 'pino';

const LEVELS: readonly pino.LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/**
 * Paths censored in every log line. Both top-level and one-level nested
 * occurrences are covered.
 * @public
 */
export const REDACTED_PATHS: readonly string[] = [
  // OAuth2 tokens and client credentials
  'access_token',
  '*.access_token',
  'refresh_token',
  '*.refresh_token',
  'accessToken',
  '*.accessToken',
  'refreshToken',
  '*.refreshToken',
  'client_secret',
  '*.client_secret',
  'clientSecret',
  '*.clientSecret',
  'authorization',
  '*.authorization',
  'Authorization',
  '*.Authorization',

  // Authorization code grant and PKCE
  'code',
  '*.code',
  'code_verifier',
  '*.code_verifier',
  'codeVerifier',
  '*.codeVerifier',
  'state',
  '*.state',

  // Generic sensitive patterns
  'password',
  '*.password',
  '*.secret',
  '*.SECRET',
];

/**
 * Reads the level from MULTI_OAUTH_LOG_LEVEL, `silent` when unset or unknown.
 * @internal
 */
function resolveLogLevel(): pino.LevelWithSilent {
  const requested = (process.env.MULTI_OAUTH_LOG_LEVEL ?? '').toLowerCase();
  return LEVELS.find((level) => level === requested) ?? 'silent';
}

/**
 * Creates a logger with the shared redaction configuration.
 *
 * Without an explicit destination the logger writes to MULTI_OAUTH_LOG_FILE
 * when set, otherwise to stdout.
 * @param destination - Optional stream, used by tests to capture output
 * @public
 */
export function createRootLogger(destination?: pino.DestinationStream): pino.Logger {
  const options: pino.LoggerOptions = {
    name: 'multi-oauth',
    level: resolveLogLevel(),
    redact: {
      paths: [...REDACTED_PATHS],
      censor: '[REDACTED]',
      remove: false,
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  if (destination) {
    return pino(options, destination);
  }

  const logFile = process.env.MULTI_OAUTH_LOG_FILE;
  if (logFile) {
    return pino(options, pino.destination({ dest: logFile, mkdir: true, sync: false }));
  }

  return pino(options);
}

/**
 * Root logger instance shared by every package.
 *
 * By default the level is `silent`; set MULTI_OAUTH_LOG_LEVEL or assign
 * `rootLogger.level` to enable output.
 *
 * @example
 * ```typescript
 * import { rootLogger } from '@multi-oauth/core';
 *
 * rootLogger.level = 'info';
 * rootLogger.info({ access_token: 'abc' }); // logs { access_token: '[REDACTED]' }
 * ```
 * @public
 */
const rootLogger = createRootLogger();

export { rootLogger };
