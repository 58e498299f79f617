import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['renderer/src/**/*.test.ts', 'postprocess/src/**/*.test.ts', 'viewer/src/**/*.test.ts'],
    environment: 'node',
  },
});
