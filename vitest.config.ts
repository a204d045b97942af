import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'dav-sync-client',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
