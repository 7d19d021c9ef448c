import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages export their built files to Node; tests run the sources.
const workspaceSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@metadata-check/core': workspaceSource('core'),
      '@metadata-check/utils': workspaceSource('utils'),
      '@metadata-check/validation': workspaceSource('validation'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**', '**/node_modules/**'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
