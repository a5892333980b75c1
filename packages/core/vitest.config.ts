import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      // Tests run against the shared sources, not its build output
      '@detonate/shared': fileURLToPath(new URL('../shared/src/types/index.ts', import.meta.url)),
    },
  },
  test: {
    name: 'core',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.test.ts',
        'src/cli.ts',
        'src/test-setup.ts',
        // Barrel re-export files — no logic to test
        'src/**/index.ts',
        // Pure TypeScript type definitions — no runtime code
        'src/**/types.ts',
      ],
      thresholds: {
        lines: 85,
        functions: 85,
        branches: 75,
        statements: 85,
      },
    },
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
