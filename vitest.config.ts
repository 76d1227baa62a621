import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['server/src/**/*.{test,spec}.ts'],
    environment: 'node'
  }
});
