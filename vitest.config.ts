import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    projects: [
      // Unit tests - fast, injected sleeper and clock
      {
        test: {
          name: 'unit',
          include: ['src/**/*.{test,spec}.ts'],
          exclude: ['node_modules', 'dist', 'temp'],
          environment: 'node',
          globals: true,
          env: {
            LOG_LEVEL: 'silent',
          },
        },
      },
    ],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['dist/**', 'temp/**', '**/*.d.ts'],
    },
  },
});
