import { describe, it, expect, afterEach, vi } from 'vitest';
import type { OAuth2Token } from '@multi-oauth/models';
import { MemoryTokenStore } from '../../implementations/memory-token-store.js';
import { FileTokenStore } from '../../implementations/file-token-store.js';
import { TokenStoreFactory } from '../../token-store-factory.js';
import { PersistenceError } from '../../errors/oauth2-errors.js';

const TOKEN: OAuth2Token = {
  accessToken: 'tok1',
  refreshToken: 'ref1',
  expiresAt: new Date('2025-01-01T13:00:00.000Z'),
  tokenType: 'Bearer',
};

describe('MemoryTokenStore', () => {
  it('saves, reads and deletes tokens', async () => {
    const store = new MemoryTokenStore();
    await store.load();

    await store.save('slack', TOKEN);
    expect(store.has('slack')).toBe(true);
    expect(store.get('slack')).toEqual(TOKEN);

    await store.delete('slack');
    await store.delete('slack');
    expect(store.get('slack')).toBeUndefined();
    expect(store.services()).toEqual([]);
  });

  it('hands out copies', async () => {
    const store = new MemoryTokenStore();
    await store.save('slack', TOKEN);

    const copy = store.get('slack');
    if (copy?.expiresAt) {
      copy.accessToken = 'changed';
      copy.expiresAt.setTime(0);
    }

    expect(store.get('slack')).toEqual(TOKEN);
  });

  it('starts with initial tokens', () => {
    const store = new MemoryTokenStore({ initialTokens: { hubspot: TOKEN } });

    expect(store.services()).toEqual(['hubspot']);
    expect(store.persistenceFailures).toBe(0);
  });

  it('reports a token that cannot be serialized instead of rejecting', async () => {
    const onPersistenceError = vi.fn();
    const store = new MemoryTokenStore({ onPersistenceError });
    const broken: OAuth2Token = { accessToken: 'tok1', expiresAt: new Date(NaN), tokenType: 'Bearer' };

    await expect(store.save('slack', broken)).resolves.toBeUndefined();
    await expect(store.delete('other')).resolves.toBeUndefined();
    await expect(store.save('hubspot', TOKEN)).resolves.toBeUndefined();

    expect(store.persistenceFailures).toBe(2);
    expect(onPersistenceError).toHaveBeenCalledTimes(2);
    expect(onPersistenceError.mock.calls[0]?.[0]).toBeInstanceOf(PersistenceError);
    expect(onPersistenceError.mock.calls[0]?.[0]).toMatchObject({
      message: 'Failed to persist tokens: Invalid time value',
    });
  });
});

describe('TokenStoreFactory', () => {
  const originalStorage = process.env.OAUTH2_TOKEN_STORAGE;
  const originalCi = process.env.CI;
  const originalNodeEnv = process.env.NODE_ENV;

  afterEach(() => {
    const restore = (name: string, value: string | undefined): void => {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    };
    restore('OAUTH2_TOKEN_STORAGE', originalStorage);
    restore('CI', originalCi);
    restore('NODE_ENV', originalNodeEnv);
  });

  it('creates the requested store', () => {
    expect(TokenStoreFactory.create('memory')).toBeInstanceOf(MemoryTokenStore);

    const fileStore = TokenStoreFactory.create('file', '/tmp/multi-oauth-tokens.json');
    expect(fileStore).toBeInstanceOf(FileTokenStore);
    expect(fileStore instanceof FileTokenStore && fileStore.filePath).toBe(
      '/tmp/multi-oauth-tokens.json',
    );
  });

  it('resolves auto to memory under CI', () => {
    process.env.CI = 'true';

    expect(TokenStoreFactory.create('auto')).toBeInstanceOf(MemoryTokenStore);
  });

  it('resolves auto to the token file outside CI and tests', () => {
    delete process.env.CI;
    delete process.env.OAUTH2_TOKEN_STORAGE;
    process.env.NODE_ENV = 'production';

    expect(TokenStoreFactory.create('auto')).toBeInstanceOf(FileTokenStore);
  });

  it('honours OAUTH2_TOKEN_STORAGE=memory for auto', () => {
    delete process.env.CI;
    process.env.NODE_ENV = 'production';
    process.env.OAUTH2_TOKEN_STORAGE = 'memory';

    expect(TokenStoreFactory.create('auto')).toBeInstanceOf(MemoryTokenStore);
  });
});
