import { rootLogger } from './logging/pino-setup.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Writes a structured event through the root logger.
 *
 * Event names are namespaced (`auth:token_refreshed`). The event name is
 * both the `event` field and the log message, so plain-text and JSON
 * consumers see the same identifier.
 * @param level - Log severity level
 * @param event - Event identifier for categorization
 * @param data - Optional structured fields, merged into the log line
 * @public
 */
export function logEvent(level: LogLevel, event: string, data?: Record<string, unknown>): void {
  rootLogger[level]({ event, ...data }, event);
}

/**
 * Logs an error event with message, stack and error name.
 * @param context - Label identifying where the error occurred
 * @param rawError - The error object or value that was thrown
 * @param extra - Additional structured context
 * @public
 */
export function logError(
  context: string,
  rawError: unknown,
  extra?: Record<string, unknown>,
): void {
  const error = rawError instanceof Error ? rawError : undefined;
  logEvent('error', `error:${context}`, {
    ...extra,
    errorName: error?.name,
    message: error?.message ?? String(rawError),
    stack: error?.stack,
  });
}
