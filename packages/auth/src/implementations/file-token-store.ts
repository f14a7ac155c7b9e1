import { promises as fs } from 'fs';
import { randomBytes } from 'crypto';
import { dirname, resolve } from 'path';
import type { PersistedTokenFile } from '@multi-oauth/models';
import { logEvent } from '@multi-oauth/core';
import { PersistenceError } from '../errors/oauth2-errors.js';
import { PersistedTokenFileSchema } from '../schemas.js';
import { BaseTokenStore, type TokenStoreOptions } from './base-token-store.js';
import { deserializeTokens } from './token-serialization.js';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Token store backed by a JSON file mapping service names to token records:
 *
 * ```json
 * {
 *   "hubspot": {
 *     "access_token": "...",
 *     "refresh_token": null,
 *     "expires_at": "2025-01-01T12:00:00.000Z",
 *     "token_type": "Bearer",
 *     "scope": null
 *   }
 * }
 * ```
 *
 * The file is replaced atomically (temporary file, then rename) with mode
 * 0600. A missing file loads as an empty set; an unreadable or malformed one
 * is logged and also loads as an empty set.
 * @public
 */
export class FileTokenStore extends BaseTokenStore {
  public readonly filePath: string;

  public constructor(filePath: string, options: TokenStoreOptions = {}) {
    super(options);
    this.filePath = resolve(filePath);
  }

  public async load(): Promise<void> {
    this.tokens.clear();

    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        logEvent('debug', 'auth:token_file_missing', { path: this.filePath });
      } else {
        logEvent('warn', 'auth:token_file_unreadable', {
          path: this.filePath,
          message: error instanceof Error ? error.message : String(error),
        });
      }
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      logEvent('warn', 'auth:token_file_invalid', {
        path: this.filePath,
        message: error instanceof Error ? error.message : String(error),
      });
      return;
    }

    const parsed = PersistedTokenFileSchema.safeParse(data);
    if (!parsed.success) {
      logEvent('warn', 'auth:token_file_invalid', {
        path: this.filePath,
        message: parsed.error.message,
      });
      return;
    }

    for (const [serviceName, token] of deserializeTokens(parsed.data)) {
      this.tokens.set(serviceName, token);
    }
    logEvent('info', 'auth:tokens_loaded', {
      path: this.filePath,
      services: this.services(),
    });
  }

  protected async persist(snapshot: PersistedTokenFile): Promise<void> {
    const tempPath = `${this.filePath}.${randomBytes(6).toString('hex')}.tmp`;
    try {
      await fs.mkdir(dirname(this.filePath), { recursive: true, mode: 0o700 });
      await fs.writeFile(tempPath, JSON.stringify(snapshot, null, 2), { mode: 0o600 });
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logEvent('debug', 'auth:token_temp_cleanup_failed', {
          path: tempPath,
          message: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      });
      throw new PersistenceError(
        `Failed to write token file: ${error instanceof Error ? error.message : String(error)}`,
        this.filePath,
        error instanceof Error ? error : undefined,
      );
    }
  }
}
