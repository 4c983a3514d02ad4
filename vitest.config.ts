import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.spec.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    // tests mutate process.env and the cached runtime config
    pool: 'forks',
    testTimeout: 15000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'lcov'],
      reportsDirectory: 'coverage',
      include: ['src/services/**', 'src/units/**', 'src/models/**', 'src/utils/**', 'src/config/**']
    }
  }
});
