import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/**/src/__tests__/**/*.test.ts', 'infra/test/**/*.test.ts'],
    testTimeout: 15000,
    env: {
      NODE_ENV: 'test',
      AWS_REGION: 'eu-west-1',
      LOG_LEVEL: 'silent',
    },
  },
});
