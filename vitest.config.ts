import { defineConfig } from 'vitest/config';

export default defineConfig({
  // 테스트 설정 (Vitest)
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts', 'src/**/*.test.ts'],
  },
});
