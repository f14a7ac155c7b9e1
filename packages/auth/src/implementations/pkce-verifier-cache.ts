import { logEvent } from '@multi-oauth/core';
import { StateMismatchError } from '../errors/oauth2-errors.js';

export const DEFAULT_VERIFIER_TTL_MS = 10 * 60 * 1000; // 10 minutes
export const DEFAULT_SWEEP_INTERVAL_MS = 2 * 60 * 1000; // 2 minutes

export interface PkceVerifierCacheOptions {
  /** Lifetime of an entry; expired entries can no longer be taken */
  ttlMs?: number;
  /** Interval of the background sweep. `0` disables sweeping. */
  sweepIntervalMs?: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

interface PendingVerifier {
  codeVerifier: string;
  createdAt: number;
}

/**
 * Holds the PKCE code verifiers of in-flight authorizations, keyed by
 * service and `state`.
 *
 * Each entry is single-use: {@link takeAndRemove} returns and deletes it in
 * one synchronous step, so two callbacks racing with the same state cannot
 * both obtain the verifier. Entries older than the TTL are rejected on
 * access and dropped by a periodic sweep whose timer does not keep the
 * process alive.
 * @public
 */
export class PkceVerifierCache {
  private readonly entries = new Map<string, Map<string, PendingVerifier>>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private sweepTimer?: NodeJS.Timeout;

  public constructor(options: PkceVerifierCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_VERIFIER_TTL_MS;
    this.now = options.now ?? (() => Date.now());

    const sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    if (sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  /** Stores a verifier, replacing any entry under the same service and state. */
  public put(serviceName: string, state: string, codeVerifier: string): void {
    let byState = this.entries.get(serviceName);
    if (!byState) {
      byState = new Map();
      this.entries.set(serviceName, byState);
    }
    byState.set(state, { codeVerifier, createdAt: this.now() });
  }

  /**
   * Returns the verifier and removes the entry.
   * @throws {StateMismatchError} When no live entry exists for the pair
   */
  public takeAndRemove(serviceName: string, state: string): string {
    const byState = this.entries.get(serviceName);
    const entry = byState?.get(state);
    if (!byState || !entry) {
      throw new StateMismatchError(serviceName);
    }

    byState.delete(state);
    if (byState.size === 0) {
      this.entries.delete(serviceName);
    }

    if (this.isExpired(entry)) {
      logEvent('info', 'auth:verifier_expired', { serviceName });
      throw new StateMismatchError(serviceName);
    }

    return entry.codeVerifier;
  }

  /** Whether the service has at least one live pending authorization. */
  public hasPending(serviceName: string): boolean {
    const byState = this.entries.get(serviceName);
    if (!byState) {
      return false;
    }
    for (const entry of byState.values()) {
      if (!this.isExpired(entry)) {
        return true;
      }
    }
    return false;
  }

  /** Number of stored entries, including expired ones not yet swept. */
  public get size(): number {
    let total = 0;
    for (const byState of this.entries.values()) {
      total += byState.size;
    }
    return total;
  }

  /**
   * Drops expired entries.
   * @returns Number of entries removed
   */
  public sweep(): number {
    let removed = 0;
    for (const [serviceName, byState] of this.entries) {
      for (const [state, entry] of byState) {
        if (this.isExpired(entry)) {
          byState.delete(state);
          removed++;
        }
      }
      if (byState.size === 0) {
        this.entries.delete(serviceName);
      }
    }

    if (removed > 0) {
      logEvent('debug', 'auth:verifiers_swept', { removed });
    }
    return removed;
  }

  /** Removes every entry, optionally only those of one service. */
  public clear(serviceName?: string): void {
    if (serviceName === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(serviceName);
    }
  }

  /** Stops the background sweep. Entries remain usable. */
  public destroy(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  private isExpired(entry: PendingVerifier): boolean {
    return this.now() - entry.createdAt >= this.ttlMs;
  }
}
