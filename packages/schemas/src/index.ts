import { z } from 'zod';
import { OAuthEnvironmentSchema, TokenStorageTypeSchema } from './config/index.js';

export * from './config/index.js';

export type OAuthEnvironment = z.infer<typeof OAuthEnvironmentSchema>;
export type TokenStorageType = z.infer<typeof TokenStorageTypeSchema>;
