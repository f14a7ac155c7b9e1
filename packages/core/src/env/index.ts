export {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
  resolveEnvVar,
} from './environment-resolver.js';
