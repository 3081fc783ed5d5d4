import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_DOMAIN_EVENTS: 'false',
      LOG_HTTP_REQUESTS: 'false'
    }
  }
});
