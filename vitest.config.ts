
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      './src/**/*.{test,spec}.ts',
    ],
    reporters: [
      'default',
    ],
    coverage: {
      include: [
        'src/**/*.ts',
      ],
      exclude: [
        'src/**/*.{test,spec}.ts',
      ],
      all: true,
      provider: 'istanbul',
      reporter: [
        'text',
        'html',
      ],
    },
  },
});
