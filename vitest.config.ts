import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.test.ts'],
    env: {
      WEBPILOT_QUIET: '1',
    },
  },
});
