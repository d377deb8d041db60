import { defineConfig } from 'vitest/config';

import {
  defineConfig as defineBaseConfig,
} from '../../tools/vitest-config/src/index';

export default defineConfig(
  defineBaseConfig({
    test: {
      // docx packing and pdfkit font loading are slow on a cold worker
      testTimeout: 20_000,
    },
  }),
);
