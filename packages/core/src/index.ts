export * from './validation-utils.js';
export * from './auth/index.js';
export * from './concurrency/index.js';

export * as RequestUtils from './utils/RequestUtils.js';

// Logging with redaction
export * from './logging/index.js';

export {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
  resolveEnvVar,
} from './env/index.js';
