import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // In-memory repositories only; *.int.test.ts needs Postgres
    include: ['src/**/*.test.ts'],
    exclude: ['src/**/*.int.test.ts'],
    restoreMocks: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/__tests__/**', 'src/test-utils/**', 'src/infra/http/server.ts'],
    },
  },
});
