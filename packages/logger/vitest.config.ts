import { defineConfig } from 'vitest/config';
import { globalConfig } from '../../vitest.config';

export default defineConfig({
  ...globalConfig,
  root: __dirname,
  test: {
    ...globalConfig.test,
    name: 'logger',
    include: ['src/**/*.spec.ts'],
  },
});
