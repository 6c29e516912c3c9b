import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'gura-parser',
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
});
