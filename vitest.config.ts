import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import { resolve } from 'path';

const __dirname = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@': resolve(__dirname, 'src'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      // Placeholder credentials so adapters can be constructed without throwing
      OPENAI_API_KEY: 'test-openai-key',
      X_API_KEY: 'test-x-api-key',
      X_API_SECRET: 'test-x-api-secret',
      SLACK_BOT_TOKEN: 'test-slack-token',
      SLACK_ALERT_CHANNEL: 'C0TEST12345',
    },
  },
});
