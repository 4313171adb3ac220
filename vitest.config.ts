import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'project-structure.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000
  }
});
