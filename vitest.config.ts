import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts', 'server/src/**/*.ts'],
      exclude: ['server/src/index.ts'],
    },
    alias: {
      '@shared': fileURLToPath(new URL('./src/shared', import.meta.url)),
      '@chart': fileURLToPath(new URL('./src/chart', import.meta.url)),
    },
  },
});
