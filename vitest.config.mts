import { configDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    setupFiles: ['test/setup.ts'],
    exclude: [...configDefaults.exclude, 'dist/**'],
    testTimeout: 10000,
  },
});
