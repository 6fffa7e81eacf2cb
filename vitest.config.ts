import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // Rendering tests rasterize through sharp
    testTimeout: 10000,
    globals: true,
  },
});
