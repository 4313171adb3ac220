import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'jobs',
    environment: 'node',
    include: ['src/**/*.test.ts']
  }
});
