import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Plain output from the CLI formatters.
    env: { NO_COLOR: '1' },
  },
});
