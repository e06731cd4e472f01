import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      // CLI 入口只做参数解析与 I/O
      exclude: ['src/**/*.test.ts', 'src/**/__test__/**', 'src/cli/index.ts'],
      reportsDirectory: './coverage',
      reporter: ['text', 'html'],
    },
  },
});
