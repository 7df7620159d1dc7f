import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/*.test.ts', 'packages/**/*.spec.ts'],
    exclude: ['node_modules', 'dist'],
    silent: true, // テスト実行時のログを抑制
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      exclude: ['node_modules/', 'dist/', '*.config.ts'],
    },
  },
  resolve: {
    alias: {
      '@tuner-cloud/shared-types': fileURLToPath(
        new URL('./packages/shared-types/src/index.ts', import.meta.url)
      ),
    },
  },
});
