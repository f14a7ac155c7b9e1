import type { OAuth2Token, PersistedTokenFile } from '@multi-oauth/models';
import { BaseTokenStore, type TokenStoreOptions } from './base-token-store.js';
import { cloneToken } from './token-serialization.js';

export interface MemoryTokenStoreOptions extends TokenStoreOptions {
  /** Tokens available right after construction */
  initialTokens?: Record<string, OAuth2Token>;
}

/**
 * Token store without a durable layer; tokens are lost on restart.
 * Used under CI and tests, or when OAUTH2_TOKEN_STORAGE=memory.
 * @public
 */
export class MemoryTokenStore extends BaseTokenStore {
  public constructor(options: MemoryTokenStoreOptions = {}) {
    super(options);
    for (const [serviceName, token] of Object.entries(options.initialTokens ?? {})) {
      this.tokens.set(serviceName, cloneToken(token));
    }
  }

  public async load(): Promise<void> {
    // Nothing durable to read
  }

  protected async persist(_snapshot: PersistedTokenFile): Promise<void> {
    // Nothing durable to write
  }
}
