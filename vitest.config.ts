import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: [
        'config.ts',
        'computeComposite.ts',
        'indicators.ts',
        'indicatorService.ts',
        'buildDashboard.ts',
        'server.ts',
        'scheduler.ts',
        'shared/**/*.ts',
        'cache/**/*.ts',
        'clients/**/*.ts',
        'utils/**/*.ts',
        'lib/**/*.ts',
      ],
      exclude: ['node_modules/**', 'tests/**', '**/*.test.ts'],
    },
  },
});
