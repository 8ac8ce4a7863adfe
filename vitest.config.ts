import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['backend/test/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
