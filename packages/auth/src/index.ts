// Errors
export * from './errors/index.js';

// Implementations
export * from './implementations/oauth2-manager.js';
export * from './implementations/service-config-registry.js';
export * from './implementations/pkce-verifier-cache.js';
export * from './implementations/base-token-store.js';
export * from './implementations/file-token-store.js';
export * from './implementations/memory-token-store.js';

// Factory
export * from './token-store-factory.js';

export * from './presets/service-presets.js';
export * from './config/environment.js';
export * from './integrations/oauth2-integration-client.js';
export * from './integrations/integration-hub.js';

export * from './schemas.js';
export * from './utils/index.js';
