import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.spec.ts'],
    env: { QUIET: '1' }
  }
});
