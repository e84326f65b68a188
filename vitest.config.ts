import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // Output tests change the working directory, which worker threads do not allow
    pool: 'forks',
  },
});
