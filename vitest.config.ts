import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.spec.ts'],
    environment: 'node',
    env: { QUIET: '1' }
  }
});
