/**
 * @fileoverview In-process CLI runs over temp workspaces
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { LlmChatOptions, LlmServiceAdapter } from '../../adapters/llm_service.js';
import { registerLlmServiceAdapter } from '../../adapters/llm_service.js';
import { DBZ_SOURCE } from '../../__tests__/fixtures.js';
import { runCli } from '../main.js';

const GUARD_REPLY = [
  '```diff',
  '@@ -4,3 +4,5 @@',
  '     for (int i = 0; i < 5; ++i) {',
  '-        total += 10 / i;',
  '+        if (i != 0) {',
  '+            total += 10 / i;',
  '+        }',
  '     }',
  '```',
].join('\n');

const GUARDED_SOURCE = [
  'int sum(void)',
  '{',
  '    int total = 0;',
  '    for (int i = 0; i < 5; ++i) {',
  '        if (i != 0) {',
  '            total += 10 / i;',
  '        }',
  '    }',
  '    return total;',
  '}',
  '',
].join('\n');

function replyingAdapter(reply: string) {
  const calls: LlmChatOptions[] = [];
  const adapter: LlmServiceAdapter = {
    chat: vi.fn(async (options: LlmChatOptions) => {
      calls.push(options);
      return { content: reply, provider: options.provider };
    }),
    checkHealth: vi.fn(async () => ({
      provider: 'claude' as const,
      available: true,
      authenticated: true,
      lastCheck: 0,
    })),
  };
  return { adapter, calls };
}

function printed(spy: MockInstance<typeof console.log>): string[] {
  return spy.mock.calls.map((call) => call.map((part) => String(part)).join(' '));
}

describe('runCli', () => {
  const dirs: string[] = [];
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    for (const dir of dirs.splice(0)) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  async function workspace(files: Record<string, string>): Promise<string> {
    const root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'klocfix-cli-')));
    dirs.push(root);
    await fs.mkdir(path.join(root, 'src'));
    for (const [name, content] of Object.entries(files)) {
      await fs.writeFile(path.join(root, 'src', name), content);
    }
    return root;
  }

  it('prints the version', async () => {
    expect(await runCli(['--version'])).toBe(0);
    expect(printed(logSpy)).toEqual(['klocfix 0.3.0']);
  });

  it('shows command help', async () => {
    expect(await runCli(['help', 'fix'])).toBe(0);
    expect(printed(logSpy).join('\n')).toContain('klocfix fix - Detect violations and apply engine patches');
  });

  it('exits 2 on an unknown command', async () => {
    expect(await runCli(['frobnicate'], { env: {} })).toBe(2);
    expect(printed(errorSpy)[0]).toBe(
      'Error [INVALID_ARGUMENT]: Unknown command: frobnicate\n\nSuggestion: Run `klocfix help <command>` for usage information.',
    );
  });

  it('exits 2 when scan has no target', async () => {
    expect(await runCli(['scan'], { env: {} })).toBe(2);
    expect(printed(errorSpy)[0]).toMatch(/^Error \[INVALID_ARGUMENT\]: klocfix scan needs a file or directory\n/);
  });

  it('exits 2 when scan is given a fix-only flag', async () => {
    const root = await workspace({});

    expect(await runCli(['scan', path.join(root, 'src'), '--mode', 'IMPROVE', '-w', root], { env: {} })).toBe(2);
    expect(printed(errorSpy)[0]).toMatch(/^Error \[INVALID_ARGUMENT\]: klocfix scan does not take --mode\n/);
  });

  it('exits 1 on an invalid mode', async () => {
    const root = await workspace({});

    expect(await runCli(['fix', path.join(root, 'src'), '--mode', 'FAST', '-w', root], { env: {} })).toBe(1);
    expect(printed(errorSpy)[0]).toMatch(/^Error \[CONFIG_INVALID\]: Configuration error for --mode: /);
  });

  it('exits 1 when the target does not exist', async () => {
    const root = await workspace({});
    const missing = path.join(root, 'missing');

    expect(await runCli(['scan', missing, '--no-classify', '-w', root], { env: {} })).toBe(1);
    expect(printed(errorSpy)[0]).toMatch(/^Error \[TARGET_NOT_FOUND\]: Target .*missing not found: /);
  });

  it('lists the bundled rule catalog as JSON', async () => {
    const root = await workspace({});

    expect(await runCli(['rules', '--json', '-w', root], { env: {} })).toBe(0);
    const output = JSON.parse(printed(logSpy)[0]) as { knowledgeBaseDir: string; rules: Array<{ id: string }> };
    expect(output.knowledgeBaseDir).toMatch(/knowledge_base$/);
    expect(output.rules.map((rule) => rule.id).sort()).toEqual([
      'ABV.ANY_SIZE_ARRAY',
      'DBZ.ITERATOR',
      'MISRA.CAST.VOID_PTR_TO_OBJ_PTR.2012',
      'MISRA.DEFINE.WRONGNAME.UNDERSCORE',
      'MISRA.FILE_PTR.DEREF.RETURN.2012',
      'NNTS.MIGHT',
    ]);
  });

  it('scans without classification and prints a violation table', async () => {
    const root = await workspace({ 'dbz.c': DBZ_SOURCE });

    expect(await runCli(['scan', path.join(root, 'src'), '--no-classify', '-w', root], { env: {} })).toBe(0);

    const lines = printed(logSpy);
    expect(lines).toContain(
      ['dbz.c', 'DBZ.ITERATOR', '5    ', 'HIGH_CRITICAL', '0.90      ', 'PATTERN_ONLY'].join(' | '),
    );
    expect(lines).toContain('\n1 violation(s) in 1 file(s)');
    expect(await fs.readFile(path.join(root, 'src', 'dbz.c'), 'utf8')).toBe(DBZ_SOURCE);
    await expect(fs.access(path.join(root, 'klocfix-out'))).rejects.toThrow();
  });

  it('fixes a file through the registered chat adapter and writes artifacts', async () => {
    const root = await workspace({ 'dbz.c': DBZ_SOURCE });
    const { adapter, calls } = replyingAdapter(GUARD_REPLY);
    registerLlmServiceAdapter(adapter);

    const code = await runCli(
      ['fix', path.join(root, 'src'), '--no-classify', '--json', '-o', 'out', '-w', root],
      { env: {}, progress: false },
    );

    expect(code).toBe(0);
    expect(calls).toHaveLength(1);
    expect(calls[0].provider).toBe('claude');

    const report: unknown = JSON.parse(printed(logSpy)[0]);
    expect(report).toMatchObject({
      mode: 'STRICT',
      files: [{ fileId: 'dbz.c', patch: { status: 'APPLIED', appliedSpans: [{ startLine: 5, endLine: 5 }] } }],
      artifacts: { failures: [] },
    });
    expect(await fs.readFile(path.join(root, 'src', 'dbz.c'), 'utf8')).toBe(GUARDED_SOURCE);

    const runs = await fs.readdir(path.join(root, 'out'));
    expect(runs).toHaveLength(1);
    expect(await fs.readFile(path.join(root, 'out', runs[0], 'modified', 'dbz.c'), 'utf8')).toBe(GUARDED_SOURCE);
  });
});
