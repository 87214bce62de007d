import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const packagesRoot = fileURLToPath(new URL('packages/', import.meta.url));

// Workspace packages resolve to their TypeScript sources.
export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@stagepack\/core\/(logging|runtime|config|reporting)$/,
        replacement: `${packagesRoot}core/src/$1/index.ts`,
      },
      {
        find: /^@stagepack\/(core|build|cli)$/,
        replacement: `${packagesRoot}$1/src/index.ts`,
      },
    ],
  },
  test: {
    passWithNoTests: true,
    environment: 'node',
    globals: true,
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/dist/**', '**/coverage/**'],
    clearMocks: true,
    restoreMocks: true,
    unstubEnvs: true,
    unstubGlobals: true,
    coverage: {
      enabled: false,
      provider: 'v8',
      reporter: ['text', 'lcov', 'json-summary'],
      reportsDirectory: 'coverage',
      exclude: ['**/dist/**', '**/coverage/**', '**/*.d.ts', '**/testing/**'],
    },
  },
});
