import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      ENABLE_LOGGING: 'false',
    },
    restoreMocks: true,
    unstubGlobals: true,
    unstubEnvs: true,
  },
});
