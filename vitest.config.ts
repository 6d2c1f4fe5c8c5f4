import {defineConfig} from 'vitest/config';

export default defineConfig({
  test: {
    coverage: {
      enabled: true,
      include: ['src/*.ts'],
      reporter: ['text', 'lcov'],
      provider: 'istanbul',
    },
    include: ['test/*.test.ts'],
    name: 'node',
    environment: 'node',
  },
});
