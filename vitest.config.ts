import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./src/__tests__/setup.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],
    env: {
      NAVIDROME_URL: 'http://localhost:4533',
      NAVIDROME_USERNAME: 'test-user',
      NAVIDROME_PASSWORD: 'test-password',
      DATABASE_PATH: ':memory:',
      LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/__tests__/**',
        'src/cli.ts',           // CLI entry point
        'src/index.ts',         // Scheduler entry point
        'src/**/types.ts',      // Type definition files
      ],
    },
  },
});
