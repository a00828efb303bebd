import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    include: ['src/**/*.test.ts'],
    env: {
      SPELL_LOG_LEVEL: 'silent',
    },
  },
});
