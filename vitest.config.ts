import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

// force vitest to use CI mode to avoid watch mode
process.env.CI = 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', '**/test/*', '**/*.test.ts', '**/dist/*', '**/*.config.ts'],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
