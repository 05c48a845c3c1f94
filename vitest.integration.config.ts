import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: { NODE_ENV: 'test' },
    include: ['src/**/*.int.{test,spec}.ts'], // Only include integration tests
    pool: 'forks',
    poolOptions: {
      forks: { singleFork: true }, // Run tests sequentially against one database
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
    },
  },
});
