/**
 * @fileoverview Tests for the rule catalog and the Markdown knowledge base source
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CatalogLoadError } from '../../core/errors.js';
import { BUNDLED_KNOWLEDGE_BASE_DIR } from '../../config/run_config.js';
import type { RuleDefinition } from '../../types.js';
import { MarkdownRuleSource, parseRuleDocument, splitFrontMatter } from '../markdown_source.js';
import { RuleCatalog, loadCatalog } from '../rule_catalog.js';

function rule(id: string, severity: RuleDefinition['severity']): RuleDefinition {
  return { id, severity, description: `${id} description`, detectionHints: [], fixGuidance: `${id} guidance` };
}

describe('RuleCatalog', () => {
  it('indexes rules by id and keeps catalog order', () => {
    const catalog = RuleCatalog.fromRules([rule('B.RULE', 'LOW'), rule('A.RULE', 'HIGH')]);

    expect(catalog.size).toBe(2);
    expect(catalog.ids()).toEqual(['B.RULE', 'A.RULE']);
    expect(catalog.get('A.RULE')?.severity).toBe('HIGH');
    expect(catalog.orderOf('B.RULE')).toBe(0);
    expect(catalog.orderOf('UNKNOWN')).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('rejects duplicate ids', () => {
    expect(() => RuleCatalog.fromRules([rule('X', 'LOW'), rule('X', 'HIGH')])).toThrow(CatalogLoadError);
  });

  it('orders priority by severity, then catalog order', () => {
    const catalog = RuleCatalog.fromRules([
      rule('FIRST.MEDIUM', 'MEDIUM'),
      rule('SECOND.CRITICAL', 'CRITICAL'),
      rule('THIRD.MEDIUM', 'MEDIUM'),
    ]);
    const sorted = ['THIRD.MEDIUM', 'FIRST.MEDIUM', 'SECOND.CRITICAL'].sort((a, b) => catalog.compareRulePriority(a, b));

    expect(sorted).toEqual(['SECOND.CRITICAL', 'FIRST.MEDIUM', 'THIRD.MEDIUM']);
  });

  it('freezes rule definitions', () => {
    const catalog = RuleCatalog.fromRules([rule('A', 'LOW')]);

    expect(Object.isFrozen(catalog.get('A'))).toBe(true);
  });
});

describe('parseRuleDocument', () => {
  it('reads front matter, description and fix guidance', () => {
    const doc = [
      '---',
      'severity: high_critical',
      'title: Demo rule',
      'hints:',
      '  - builtin:loop-iterator-divisor',
      '  - "regex:\\\\bgets\\\\("',
      '---',
      '# DEMO.RULE',
      '',
      'Explains the rule.',
      '',
      '## Fix guidance',
      '',
      'Guard it.',
      '',
      '## References',
      'MISRA C:2012',
    ].join('\n');

    const parsed = parseRuleDocument('DEMO.RULE', doc);

    expect(parsed.severity).toBe('HIGH_CRITICAL');
    expect(parsed.title).toBe('Demo rule');
    expect(parsed.detectionHints).toEqual(['builtin:loop-iterator-divisor', 'regex:\\bgets\\(']);
    expect(parsed.description).toBe('Explains the rule.\n\n## References\nMISRA C:2012');
    expect(parsed.fixGuidance).toBe('Guard it.');
  });

  it('defaults severity and reuses the description when there is no front matter', () => {
    const parsed = parseRuleDocument('PLAIN', 'Plain rule text.\n');

    expect(parsed.severity).toBe('MEDIUM');
    expect(parsed.detectionHints).toEqual([]);
    expect(parsed.fixGuidance).toBe('Plain rule text.');
  });

  it('rejects an unknown severity', () => {
    expect(() => parseRuleDocument('BAD', '---\nseverity: urgent\n---\nbody\n')).toThrow(CatalogLoadError);
  });

  it('splits CRLF documents', () => {
    const { frontMatter, body } = splitFrontMatter('---\r\nseverity: LOW\r\n---\r\nbody\r\n');

    expect(frontMatter).toEqual({ severity: 'LOW' });
    expect(body).toBe('body\n');
  });
});

describe('MarkdownRuleSource', () => {
  let kbDir: string;

  beforeEach(async () => {
    kbDir = await mkdtemp(join(tmpdir(), 'klocfix-kb-'));
  });

  afterEach(async () => {
    await rm(kbDir, { recursive: true, force: true });
  });

  it('loads .md files in file-name order and ignores other files', async () => {
    await writeFile(join(kbDir, 'ZZ.LAST.md'), '---\nseverity: LOW\n---\nlast\n');
    await writeFile(join(kbDir, 'AA.FIRST.md'), '---\nseverity: HIGH\n---\nfirst\n');
    await writeFile(join(kbDir, 'notes.txt'), 'ignored');

    const catalog = await loadCatalog(new MarkdownRuleSource(kbDir));

    expect(catalog.ids()).toEqual(['AA.FIRST', 'ZZ.LAST']);
  });

  it('keeps loading when a hint is not a string', async () => {
    await writeFile(join(kbDir, 'A.GOOD.md'), '---\nhints:\n  - builtin:void-pointer-cast\n---\ngood\n');
    await writeFile(join(kbDir, 'B.BAD.md'), '---\nhints:\n  - regex: \\bstrncpy\n---\nbad\n');

    const catalog = await loadCatalog(new MarkdownRuleSource(kbDir));

    expect(catalog.ids()).toEqual(['A.GOOD', 'B.BAD']);
    expect(catalog.get('B.BAD')?.detectionHints).toEqual([{ regex: '\\bstrncpy' }]);
  });

  it('fails with CatalogLoadError when the directory is missing', async () => {
    await expect(loadCatalog(new MarkdownRuleSource(join(kbDir, 'missing')))).rejects.toBeInstanceOf(CatalogLoadError);
  });

  it('fails with CatalogLoadError when there are no rules', async () => {
    await mkdir(join(kbDir, 'empty'));

    await expect(loadCatalog(new MarkdownRuleSource(join(kbDir, 'empty')))).rejects.toThrow('no rules found');
  });

  it('loads the bundled knowledge base', async () => {
    const catalog = await loadCatalog(new MarkdownRuleSource(BUNDLED_KNOWLEDGE_BASE_DIR));

    expect(catalog.ids()).toEqual([
      'ABV.ANY_SIZE_ARRAY',
      'DBZ.ITERATOR',
      'MISRA.CAST.VOID_PTR_TO_OBJ_PTR.2012',
      'MISRA.DEFINE.WRONGNAME.UNDERSCORE',
      'MISRA.FILE_PTR.DEREF.RETURN.2012',
      'NNTS.MIGHT',
    ]);
    expect(catalog.get('DBZ.ITERATOR')?.severity).toBe('HIGH_CRITICAL');
    expect(catalog.get('DBZ.ITERATOR')?.detectionHints).toEqual(['builtin:loop-iterator-divisor']);
  });
});
