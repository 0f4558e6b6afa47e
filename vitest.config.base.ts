import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

const repoRoot = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  plugins: [tsconfigPaths({ root: repoRoot })],
  test: {
    environment: 'node',
    globals: true,
    include: ['{src,tests}/**/*.{test,spec}.ts'],
    exclude: ['**/dist/**', '**/coverage/**'],
    clearMocks: true,
    restoreMocks: true,
    unstubEnvs: true,
    unstubGlobals: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'json-summary'],
      reportsDirectory: 'coverage',
      exclude: ['**/dist/**', '**/coverage/**', '**/*.d.ts', '**/test{,s}/**/*.ts'],
    },
  },
});
