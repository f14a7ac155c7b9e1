import type { OAuth2Token, PersistedTokenFile } from '@multi-oauth/models';
import { type ITokenStore, logEvent } from '@multi-oauth/core';
import { PersistenceError } from '../errors/oauth2-errors.js';
import { cloneToken, serializeTokens } from './token-serialization.js';

export interface TokenStoreOptions {
  /** Called for every failed write. Errors thrown by the hook are logged. */
  onPersistenceError?: (error: PersistenceError) => void;
}

/**
 * In-memory token map with write-behind persistence.
 *
 * Every mutation updates the map synchronously, takes a snapshot and queues
 * a write of that snapshot. Writes run one at a time in mutation order, so
 * the durable copy always ends at the latest state. Write failures are
 * counted, logged and passed to `onPersistenceError`; they never reject.
 */
export abstract class BaseTokenStore implements ITokenStore {
  protected readonly tokens = new Map<string, OAuth2Token>();
  private readonly onPersistenceError?: (error: PersistenceError) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private failedWrites = 0;

  protected constructor(options: TokenStoreOptions = {}) {
    this.onPersistenceError = options.onPersistenceError;
  }

  public abstract load(): Promise<void>;

  /** Writes a complete snapshot to durable storage */
  protected abstract persist(snapshot: PersistedTokenFile): Promise<void>;

  public get(serviceName: string): OAuth2Token | undefined {
    const token = this.tokens.get(serviceName);
    return token ? cloneToken(token) : undefined;
  }

  public has(serviceName: string): boolean {
    return this.tokens.has(serviceName);
  }

  public services(): string[] {
    return [...this.tokens.keys()];
  }

  public async save(serviceName: string, token: OAuth2Token): Promise<void> {
    this.tokens.set(serviceName, cloneToken(token));
    logEvent('debug', 'auth:token_saved', {
      serviceName,
      hasExpiry: token.expiresAt !== undefined,
      hasRefreshToken: token.refreshToken !== undefined,
    });
    await this.flush();
  }

  public async delete(serviceName: string): Promise<void> {
    if (!this.tokens.delete(serviceName)) {
      return;
    }
    logEvent('debug', 'auth:token_deleted', { serviceName });
    await this.flush();
  }

  /** Number of writes that failed since construction */
  public get persistenceFailures(): number {
    return this.failedWrites;
  }

  protected flush(): Promise<void> {
    let snapshot: PersistedTokenFile | Error;
    try {
      snapshot = serializeTokens(this.tokens);
    } catch (error) {
      snapshot = error instanceof Error ? error : new Error(String(error));
    }
    const write = this.writeQueue
      .then(() => {
        if (snapshot instanceof Error) {
          throw snapshot;
        }
        return this.persist(snapshot);
      })
      .catch((error: unknown) => this.reportFailure(error));
    this.writeQueue = write;
    return write;
  }

  private reportFailure(error: unknown): void {
    const failure =
      error instanceof PersistenceError
        ? error
        : new PersistenceError(
            `Failed to persist tokens: ${error instanceof Error ? error.message : String(error)}`,
            undefined,
            error instanceof Error ? error : undefined,
          );
    this.failedWrites++;

    logEvent('error', 'auth:token_persist_failed', {
      path: failure.path,
      message: failure.message,
      failures: this.failedWrites,
    });

    if (!this.onPersistenceError) {
      return;
    }
    try {
      this.onPersistenceError(failure);
    } catch (hookError) {
      logEvent('warn', 'auth:persistence_hook_failed', {
        message: hookError instanceof Error ? hookError.message : String(hookError),
      });
    }
  }
}
