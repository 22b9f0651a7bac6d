import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const sourceEntry = (dir: string): string =>
  fileURLToPath(new URL(`./${dir}/src/index.ts`, import.meta.url));

/**
 * Root vitest configuration: one run covers every package and app.
 * Workspace packages resolve to their sources, so tests need no build.
 */
export default defineConfig({
  resolve: {
    alias: {
      '@leakgate/core': sourceEntry('packages/core'),
      '@repo/shared-config': sourceEntry('packages/shared-config'),
      '@repo/shared-types': sourceEntry('packages/shared-types'),
      '@repo/shared-utils': sourceEntry('packages/shared-utils'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/node_modules/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', '**/*.d.ts', '**/*.config.ts', '**/node_modules/**', '**/__tests__/**'],
    },
    testTimeout: 30000,
    reporters: ['default'],
  },
});
