export * from './oauth/index.js';

export type { EnvVarPatternResolverConfig } from './EnvVarPatternResolverConfig.js';
