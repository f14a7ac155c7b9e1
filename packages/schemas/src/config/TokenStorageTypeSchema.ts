import { z } from 'zod';

/**
 * Token storage backend selection. `auto` resolves to memory under CI or
 * tests and to the JSON file otherwise.
 */
export const TokenStorageTypeSchema = z.enum(['file', 'memory', 'auto']);
