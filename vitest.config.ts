import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/**/*.test.ts', '*.test.ts'],
    // Keep a developer's .env out of the unit tests.
    env: {
      GEMINI_API_KEY: '',
      GOOGLE_API_KEY: '',
    },
  },
});
