import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],

    globals: true,

    isolate: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts', // Entry point
        'dist/**',
        'tests/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
    },
  },
});
