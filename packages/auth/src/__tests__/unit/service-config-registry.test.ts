import { describe, it, expect } from 'vitest';
import { ServiceConfigRegistry } from '../../implementations/service-config-registry.js';
import { ConfigurationError } from '../../errors/oauth2-errors.js';
import { createTestServiceConfig, TEST_SERVICE } from '../test-utils.js';

describe('ServiceConfigRegistry', () => {
  it('stores and returns frozen configurations', () => {
    const registry = new ServiceConfigRegistry({});

    registry.register(TEST_SERVICE);
    const config = registry.get('example');

    expect(config).toEqual(TEST_SERVICE);
    expect(Object.isFrozen(config)).toBe(true);
    expect(registry.has('example')).toBe(true);
    expect(registry.list()).toEqual(['example']);
  });

  it('replaces a configuration registered twice', () => {
    const registry = new ServiceConfigRegistry({});

    registry.register(TEST_SERVICE);
    registry.register(createTestServiceConfig({ scope: 'admin' }));

    expect(registry.get('example').scope).toBe('admin');
    expect(registry.list()).toEqual(['example']);
  });

  it('fails for unknown services', () => {
    const registry = new ServiceConfigRegistry({});

    expect(() => registry.get('missing')).toThrow(ConfigurationError);
    expect(() => registry.get('missing')).toThrow("Service 'missing' is not registered");
  });

  it('resolves environment references at registration', () => {
    const registry = new ServiceConfigRegistry({ EXAMPLE_CLIENT_ID: 'env-client' });

    registry.register(
      createTestServiceConfig({
        clientId: '${EXAMPLE_CLIENT_ID}',
        scope: '${EXAMPLE_SCOPE:read}',
      }),
    );

    expect(registry.get('example').clientId).toBe('env-client');
    expect(registry.get('example').scope).toBe('read');
  });

  it('rejects unresolvable references', () => {
    const registry = new ServiceConfigRegistry({});

    expect(() =>
      registry.register(createTestServiceConfig({ clientSecret: '${EXAMPLE_SECRET}' })),
    ).toThrow(
      "Cannot resolve configuration for service 'example': Required environment variable 'EXAMPLE_SECRET' is not defined",
    );
  });

  it('rejects missing fields and invalid URLs', () => {
    const registry = new ServiceConfigRegistry({});

    expect(() => registry.register(createTestServiceConfig({ clientId: '' }))).toThrow(
      "Invalid configuration for service 'example': ServiceConfig: Missing required field: clientId",
    );
    expect(() => registry.register(createTestServiceConfig({ tokenEndpoint: '/token' }))).toThrow(
      'tokenEndpoint: Invalid URL format: /token',
    );
    expect(() => registry.register(createTestServiceConfig({ serviceName: 'bad/name' }))).toThrow(
      ConfigurationError,
    );
    expect(registry.list()).toEqual([]);
  });

  it('unregisters services', () => {
    const registry = new ServiceConfigRegistry({});
    registry.register(TEST_SERVICE);

    expect(registry.unregister('example')).toBe(true);
    expect(registry.unregister('example')).toBe(false);
    expect(registry.has('example')).toBe(false);
  });
});
