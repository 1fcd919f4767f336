import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';

import { defineConfig } from 'vitest/config';

const rootDir = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@': resolve(rootDir, 'src'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    // Forks, not threads: the build controller calls process.chdir(), which
    // worker threads reject.
    pool: 'forks',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.test.ts',
        'src/test/**',
        'src/test-support/**',
        'src/index.ts',
        'src/cli/bin/**',
      ],
    },
    setupFiles: [resolve(rootDir, 'src/test/setup.ts')],
    testTimeout: 15000,
    hookTimeout: 10000,
  },
});
