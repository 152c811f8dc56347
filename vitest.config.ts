import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Clears the env vars the CLI reads
    setupFiles: ['./test/setup.ts'],
    pool: 'threads',
    include: ['test/**/*.test.ts'],
  },
});
