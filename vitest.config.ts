import { mkdirSync } from 'node:fs';
import { defineConfig } from 'vitest/config';

// Ensure a stable, writable temp directory for fixture trees.
const fallbackTmpDir = '/tmp';
const resolvedTmpDir =
  process.env.TMPDIR && process.env.TMPDIR.trim().length > 0
    ? process.env.TMPDIR
    : fallbackTmpDir;
process.env.TMPDIR = resolvedTmpDir;
process.env.TMP = resolvedTmpDir;
process.env.TEMP = resolvedTmpDir;
try {
  mkdirSync(resolvedTmpDir, { recursive: true });
} catch {
  // If we cannot create it, let vitest surface the error normally.
}

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts', 'vitest.setup.ts'],
    },
  },
});
