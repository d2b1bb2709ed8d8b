import { defineConfig } from 'vitest/config';

/**
 * ユニットテスト用のvitest設定
 *
 * PostgreSQL 統合テストは packages/archiver/vitest.config.db.ts で別途実行する
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/__tests__/**/Postgres*.test.ts'],
  },
});
