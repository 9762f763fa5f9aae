import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      OPENAI_API_KEY: 'test-openai-key',
      THEIRSTACK_API_KEY: 'test-theirstack-key'
    }
  }
});
