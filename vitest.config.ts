import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

// Workspace packages export their built dist; tests run against the sources
function packageSource(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@branchgate/utils': packageSource('utils'),
      '@branchgate/git': packageSource('git'),
      '@branchgate/config': packageSource('config'),
      '@branchgate/core': packageSource('core'),
      '@branchgate/supabase': packageSource('supabase'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./vitest.setup.ts'],
    include: ['packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Tests that spawn git or node need headroom on slow CI machines
    testTimeout: 30000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/index.ts', // Re-exports only
        'packages/*/src/types.ts', // Type definitions only
        'packages/cli/src/bin.ts', // CLI entry point
      ],
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
      },
    },
  },
});
