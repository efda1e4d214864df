import { defineConfig, configDefaults } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: [...configDefaults.exclude, 'dist/**'],
    env: {
      LOG_FILE_ENABLED: 'false',
      LOG_LEVEL: 'error',
    },
  },
});
