import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    restoreMocks: true,
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      NODE_ENV: 'test',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/*.d.ts',
        // Entry points (mostly imports/exports - no logic to test)
        'src/index.ts',
        'src/start-server.ts',
        'src/core/index.ts',
        'src/oauth/index.ts',
        'src/config/index.ts',
        'src/config/schemas/index.ts',
        // Type-only files
        'src/core/types.ts',
        'src/oauth/types.ts',
        'src/testing/**',
      ],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
    },
  },
});
