import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Probe and scheduling tests use short real timers
    // and can be timing-sensitive on loaded CI runners
    retry: 2,
  },
});
