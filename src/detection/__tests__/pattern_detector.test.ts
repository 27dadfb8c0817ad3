/**
 * @fileoverview Tests for the pattern detector and its C scanning helpers
 */

import { describe, it, expect } from 'vitest';
import { DetectionError } from '../../core/errors.js';
import type { RuleDefinition } from '../../types.js';
import { SAMPLE_RULES, SAMPLE_SOURCE, sampleCatalog } from '../../__tests__/fixtures.js';
import { findMatchingBracket, lineAt, maskSource } from '../c_source.js';
import {
  BUILTIN_CONFIDENCE,
  REGEX_CONFIDENCE,
  detectCandidates,
  parseDetectionHint,
} from '../pattern_detector.js';

function singleRule(id: string, hints: unknown[]): RuleDefinition {
  return { id, severity: 'MEDIUM', description: id, detectionHints: hints, fixGuidance: id };
}

function linesFor(source: string, hint: string): number[] {
  const catalog = sampleCatalog([singleRule('TEST.RULE', [hint])]);
  return detectCandidates('f.c', source, catalog).candidates.map((c) => c.span.startLine);
}

describe('maskSource', () => {
  it('blanks comments and literals while keeping length and newlines', () => {
    const source = 'int a = 1; /* x / y\n z */ char *s = "a // b";\n// tail\n';
    const masked = maskSource(source);

    expect(masked.text).toHaveLength(source.length);
    expect(masked.text.split('\n')).toHaveLength(source.split('\n').length);
    expect(masked.text).not.toContain('/');
    expect(masked.text).toContain('char *s = "      ";');
  });

  it('keeps literals verbatim on request without opening comments inside them', () => {
    const masked = maskSource('p = "/*"; q = \'\\0\'; /* gone */', { keepLiterals: true });

    expect(masked.text).toBe('p = "/*"; q = \'\\0\';           ');
  });

  it('maps offsets to 1-based lines and matches brackets', () => {
    const { text, lineStarts } = maskSource('a\nb(c[d]{e})\n');

    expect(lineAt(lineStarts, 0)).toBe(1);
    expect(lineAt(lineStarts, 3)).toBe(2);
    expect(findMatchingBracket(text, 3)).toBe(11);
  });
});

describe('parseDetectionHint', () => {
  it('accepts builtins and both regex forms', () => {
    expect(parseDetectionHint('R', 'builtin:void-pointer-cast').kind).toBe('builtin');

    const plain = parseDetectionHint('R', 'regex:\\bgets\\(');
    const flagged = parseDetectionHint('R', 'regex:/gets/gi');

    expect(plain.kind === 'regex' && plain.regex.source).toBe('\\bgets\\(');
    expect(flagged.kind === 'regex' && flagged.regex.flags).toBe('i');
  });

  it.each([
    ['no-separator', 'expected builtin:<name> or regex:<pattern>'],
    ['builtin:teleport', 'unknown builtin detector "teleport"'],
    ['regex:', 'empty pattern'],
    ['ast:call', 'unknown hint kind "ast"'],
  ])('rejects %s', (hint, message) => {
    expect(() => parseDetectionHint('R', hint)).toThrow(message);
  });

  it('rejects patterns that do not compile', () => {
    expect(() => parseDetectionHint('R', 'regex:(')).toThrow(DetectionError);
  });

  it('rejects entries that are not strings', () => {
    expect(() => parseDetectionHint('R', { regex: '\\bfoo' })).toThrow(
      'Rule R hint "{"regex":"\\\\bfoo"}" is unusable: expected a string, got a mapping (quote hints that contain ": ")',
    );
    expect(() => parseDetectionHint('R', 42)).toThrow('expected a string, got number');
    expect(() => parseDetectionHint('R', null)).toThrow('expected a string, got null');
  });
});

describe('detectCandidates', () => {
  it('finds one candidate per builtin in the sample file, sorted by line', () => {
    const { candidates, errors } = detectCandidates('sample.c', SAMPLE_SOURCE, sampleCatalog());

    expect(errors).toEqual([]);
    expect(candidates.map((c) => [c.ruleId, c.span.startLine, c.span.endLine])).toEqual([
      ['MISRA.DEFINE.WRONGNAME.UNDERSCORE', 3, 3],
      ['ABV.ANY_SIZE_ARRAY', 6, 6],
      ['DBZ.ITERATOR', 11, 11],
      ['MISRA.CAST.VOID_PTR_TO_OBJ_PTR.2012', 18, 18],
      ['MISRA.FILE_PTR.DEREF.RETURN.2012', 23, 23],
      ['NNTS.MIGHT', 28, 28],
    ]);
    expect(candidates.every((c) => c.source === 'PATTERN' && c.confidence === BUILTIN_CONFIDENCE)).toBe(true);
    expect(candidates.every((c) => c.fileId === 'sample.c')).toBe(true);
  });

  it('is deterministic', () => {
    const catalog = sampleCatalog();

    expect(detectCandidates('a.c', SAMPLE_SOURCE, catalog)).toEqual(detectCandidates('a.c', SAMPLE_SOURCE, catalog));
  });

  it('skips a rule with a malformed hint and keeps scanning the others', () => {
    const rules = [singleRule('BROKEN', ['builtin:void-pointer-cast', 'regex:[']), ...SAMPLE_RULES];
    const { candidates, errors } = detectCandidates('sample.c', SAMPLE_SOURCE, sampleCatalog(rules));

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(DetectionError);
    expect(errors[0].ruleId).toBe('BROKEN');
    expect(candidates.some((c) => c.ruleId === 'BROKEN')).toBe(false);
    expect(candidates).toHaveLength(6);
  });

  it('skips a rule whose hint was loaded as a mapping', () => {
    const rules = [singleRule('MAPPED', [{ regex: '\\bstrncpy' }]), ...SAMPLE_RULES];
    const { candidates, errors } = detectCandidates('sample.c', SAMPLE_SOURCE, sampleCatalog(rules));

    expect(errors.map((error) => [error.ruleId, error.hint])).toEqual([['MAPPED', '{"regex":"\\\\bstrncpy"}']]);
    expect(candidates.map((c) => c.ruleId)).not.toContain('MAPPED');
    expect(candidates).toHaveLength(6);
  });

  it('keeps one candidate per rule and span, preferring the builtin confidence', () => {
    const rules = [singleRule('DUP', ['regex:_hidden', 'builtin:reserved-macro-name', 'regex:define'])];
    const { candidates } = detectCandidates('sample.c', SAMPLE_SOURCE, sampleCatalog(rules));

    expect(candidates).toHaveLength(1);
    expect(candidates[0].span).toEqual({ startLine: 3, endLine: 3 });
    expect(candidates[0].confidence).toBe(BUILTIN_CONFIDENCE);
  });

  it('matches regex hints per line, outside comments', () => {
    const source = ['  GETS(buf);', '  /* gets(buf); */', '  gets (buf);', ''].join('\n');
    const { candidates } = detectCandidates('r.c', source, sampleCatalog([singleRule('RX', ['regex:/gets\\s*\\(/i'])]));

    expect(candidates.map((c) => c.span.startLine)).toEqual([1, 3]);
    expect(candidates[0].confidence).toBe(REGEX_CONFIDENCE);
  });
});

describe('builtin detectors', () => {
  describe('loop-iterator-divisor', () => {
    const hint = 'builtin:loop-iterator-divisor';

    it('flags single-statement bodies and modulo', () => {
      const source = ['for (unsigned n = 0u; n < 3u; n++) total += 9 % n;', ''].join('\n');

      expect(linesFor(source, hint)).toEqual([1]);
    });

    it('ignores guarded divisions, other starts and comments', () => {
      const source = [
        'for (int k = 0; k < 4; ++k) {',
        '    int r = (k != 0) ? 100 / k : 0;',
        '    /* 1 / k */',
        '}',
        'for (int j = 1; j < 4; ++j) { x = 8 / j; }',
        'for (int m = 0; m < 4; ++m) { y = m / 2; }',
        '',
      ].join('\n');

      expect(linesFor(source, hint)).toEqual([]);
    });

    it('flags a division guarded only on an unrelated line further up', () => {
      const source = ['for (int k = 0; k < 4; ++k) {', '    if (k != 0) { log(k); }', '', '    r = 5 / k;', '}', ''].join(
        '\n',
      );

      expect(linesFor(source, hint)).toEqual([4]);
    });
  });

  it('flexible-array-member only looks inside aggregates', () => {
    const source = ['void f(int a[]);', 'union u {', '    int tail[];', '};', ''].join('\n');

    expect(linesFor(source, 'builtin:flexible-array-member')).toEqual([3]);
  });

  it('void-pointer-cast flags allocator results and void variables, not other casts', () => {
    const source = [
      'char *a = (char *)malloc(4);',
      'int *b = (int *)other;',
      'void *v = get();',
      'unsigned char *c = (unsigned char *)v;',
      'void *w = (void *)b;',
      '',
    ].join('\n');

    expect(linesFor(source, 'builtin:void-pointer-cast')).toEqual([1, 4]);
  });

  it('strncpy-unterminated accepts an explicit terminator within two lines', () => {
    const source = [
      'strncpy(a, src, sizeof(a));',
      "a[sizeof(a) - 1] = '\\0';",
      'strncpy(b, src, 4);',
      'x = 1;',
      'y = 2;',
      'b[3] = 0;',
      '',
    ].join('\n');

    expect(linesFor(source, 'builtin:strncpy-unterminated')).toEqual([3]);
  });

  it('reserved-macro-name flags underscore macros only', () => {
    const source = ['#define _X 1', '#  define OK_ 2', '#define Y _X', ''].join('\n');

    expect(linesFor(source, 'builtin:reserved-macro-name')).toEqual([1]);
  });

  it('file-pointer-deref flags member access and dereference but not declarations', () => {
    const source = [
      'int f(FILE *fp, int *p)',
      '{',
      '    int n = fp->_flags;',
      '    FILE copy = *fp;',
      '    fclose(fp);',
      '    return *p * 2;',
      '}',
      '',
    ].join('\n');

    expect(linesFor(source, 'builtin:file-pointer-deref')).toEqual([3, 4]);
  });
});
