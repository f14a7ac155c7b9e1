import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// force vitest to use CI mode to avoid watch mode
process.env.CI = 'true';

const packageEntry = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@multi-oauth/models': packageEntry('models'),
      '@multi-oauth/core': packageEntry('core'),
      '@multi-oauth/schemas': packageEntry('schemas'),
      '@multi-oauth/auth': packageEntry('auth'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    pool: 'forks',
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
