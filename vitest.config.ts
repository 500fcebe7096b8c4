import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Supervisor and watch loop tests spawn real child processes
    pool: 'forks',
    include: ['test/**/*.test.ts'],
    testTimeout: process.platform === 'win32' ? 30000 : 15000,
    hookTimeout: process.platform === 'win32' ? 30000 : 10000,
    isolate: true,
    exclude: ['node_modules/**', 'dist/**'],
  },
  resolve: {
    extensions: ['.js', '.ts', '.json'],
  },
});
