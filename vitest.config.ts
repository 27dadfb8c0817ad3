import { mkdirSync } from 'node:fs';
import { defineConfig, type UserConfig } from 'vitest/config';

// Ensure a stable, writable temp directory for vitest internals and for the
// workspaces the pipeline tests create.
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

/**
 * Vitest Configuration for klocfix
 *
 * Test tiers controlled by the KLOCFIX_TEST_MODE environment variable:
 * - 'unit' (default): stub engine and mocked CLI providers only
 * - 'live': also runs *.live.test.ts, which call a real claude/codex CLI
 */
export default defineConfig((): UserConfig => {
  const mode = process.env.KLOCFIX_TEST_MODE ?? 'unit';
  const exclude = ['node_modules/**', 'dist/**'];
  if (mode === 'unit') {
    exclude.push('**/*.live.test.ts');
  }

  return {
    test: {
      globals: true,
      environment: 'node',
      include: ['src/**/*.test.ts'],
      exclude,
      setupFiles: ['./vitest.setup.ts'],
      testTimeout: mode === 'live' ? 300000 : 30000,
      hookTimeout: mode === 'live' ? 60000 : 10000,
      pool: 'forks',
      coverage: {
        provider: 'v8',
        reporter: ['text', 'json', 'html'],
        exclude: [
          'node_modules/',
          'dist/',
          '**/*.test.ts',
          'vitest.config.ts',
          'vitest.setup.ts',
        ],
      },
    },
  };
});
