import type { UserConfig } from 'vitest/config';

/**
 * Shared Vitest configuration for every workspace.
 *
 * Tests live beside their sources as `*.test.ts`. Mocks are cleared and reset
 * between tests so each case sets up its own stubs.
 */
export const defineConfig = (options: UserConfig = {}): UserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      unstubGlobals: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['src/**/*.ts'],
        exclude: ['**/index.ts', 'src/**/*.test.ts'],
      },
      ...options.test,
    },
  };
};
