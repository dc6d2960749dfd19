import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const root = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'tests/',
        '**/*.d.ts',
        '**/*.config.*',
        '**/dist/**'
      ],
      thresholds: {
        branches: 80,
        functions: 80,
        lines: 80,
        statements: 80
      }
    },
    testTimeout: 30000
  },
  resolve: {
    alias: {
      '@tether/shared': root('./packages/shared/src/index.ts'),
      '@tether/sdk': root('./packages/sdk/src/index.ts'),
      '@tether/cli': root('./packages/cli/src/index.ts')
    }
  }
});
