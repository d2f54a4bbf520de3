import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from './src/index';

const baseConfig = defineBaseConfig();

export default defineConfig({
  ...baseConfig,
  test: {
    ...baseConfig.test,
    name: 'vitest-config',
  },
});
