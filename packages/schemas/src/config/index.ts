export * from './TokenStorageTypeSchema.js';
export * from './OAuthEnvironmentSchema.js';
