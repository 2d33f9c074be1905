import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  resolve: {
    alias: {
      '~': fileURLToPath(new URL('./src', import.meta.url))
    }
  },
  test: {
    include: ['src/**/*.test.ts'],
    testTimeout: 30000,
    env: {
      NODE_ENV: 'test',
      TEMP_DIR: 'test-outputs/tmp'
    }
  }
});
