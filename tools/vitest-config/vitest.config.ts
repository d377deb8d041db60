import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from './src/index';

export default defineConfig(
  defineBaseConfig({
    test: {
      coverage: {
        provider: 'v8',
        reporter: ['text'],
        include: ['src/**/*.ts'],
        exclude: ['**/*.test.ts'],
      },
    },
  }),
);
