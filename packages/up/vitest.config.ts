import { defineConfig } from 'vitest/config';
import { globalConfig } from '../../vitest.config';

export default defineConfig({
  ...globalConfig,
  root: __dirname,
  test: {
    ...globalConfig.test,
    name: 'up',
    include: ['src/**/*.spec.ts'],
  },
});
