import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['provisioning-service/src/**/*.test.ts'],
    environment: 'node',
    // Provisioners log every step; keep test output readable
    silent: true,
  },
});
