import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      SMARTCAM_DISABLE_AUTO_START: '1'
    }
  }
});
