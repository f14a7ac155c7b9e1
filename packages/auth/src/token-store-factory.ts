import { type ITokenStore, logEvent } from '@multi-oauth/core';
import { DEFAULT_TOKEN_STORE_PATH, type TokenStorageType } from '@multi-oauth/schemas';
import { FileTokenStore } from './implementations/file-token-store.js';
import { MemoryTokenStore } from './implementations/memory-token-store.js';
import type { TokenStoreOptions } from './implementations/base-token-store.js';

/**
 * Creates token stores for the configured storage strategy.
 * @example
 * ```typescript
 * // JSON file outside CI, memory under CI and tests
 * const store = TokenStoreFactory.create('auto', '/var/lib/app/tokens.json');
 *
 * const memory = TokenStoreFactory.create('memory');
 * ```
 * @public
 */
export class TokenStoreFactory {
  /**
   * @param type - `file`, `memory`, or `auto` to decide from the environment
   * @param filePath - Token file for the file store, `.oauth_tokens.json` by default
   */
  public static create(
    type: TokenStorageType = 'auto',
    filePath: string = DEFAULT_TOKEN_STORE_PATH,
    options: TokenStoreOptions = {},
  ): ITokenStore {
    const resolvedType = this.resolveStorageType(type);

    switch (resolvedType) {
      case 'memory':
        logEvent('debug', 'auth:storage_created', { type: 'memory', requested: type });
        return new MemoryTokenStore(options);

      case 'file':
        logEvent('debug', 'auth:storage_created', { type: 'file', requested: type, path: filePath });
        return new FileTokenStore(filePath, options);

      default: {
        const _exhaustive: never = resolvedType;
        throw new Error(`Unsupported storage type: ${String(_exhaustive)}`);
      }
    }
  }

  /**
   * `auto` becomes `memory` under CI, with NODE_ENV=test or with
   * OAUTH2_TOKEN_STORAGE=memory, and `file` otherwise.
   * @internal
   */
  private static resolveStorageType(type: TokenStorageType): 'memory' | 'file' {
    if (type !== 'auto') {
      return type;
    }

    if (
      process.env.CI ||
      process.env.NODE_ENV === 'test' ||
      process.env.OAUTH2_TOKEN_STORAGE === 'memory'
    ) {
      return 'memory';
    }

    return 'file';
  }
}
