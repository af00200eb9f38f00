import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import tsconfigPaths from 'vite-tsconfig-paths';

const root = (dir: string) => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    setupFiles: ['tests/setup.ts'],
    environment: 'node',
    globals: true,
    testTimeout: 30000,
    include: [
      'tests/integration/**/*.test.ts',
      'services/**/*.test.ts',
      'interpreter/**/*.test.ts',
      'core/**/*.test.ts',
      'cli/**/*.test.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ],
    alias: {
      '@core': root('./core'),
      '@services': root('./services'),
      '@interpreter': root('./interpreter'),
      '@cli': root('./cli'),
      '@tests': root('./tests')
    }
  }
});
