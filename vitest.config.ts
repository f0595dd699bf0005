import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.{js,ts}'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        'src/cli.ts',
        'src/server.ts',
        'src/tools/**/*.ts', // Thin registrations; builders are covered through src/scripts
      ],
      reporter: ['text', 'html', 'lcov'],
    },
  },
});
