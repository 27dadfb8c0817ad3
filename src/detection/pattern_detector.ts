/**
 * @fileoverview Pattern Detector
 *
 * Deterministic scan of one file against the catalog's detection hints.
 * A hint is either `builtin:<name>` (a structural detector below) or
 * `regex:<pattern>` / `regex:/<pattern>/<flags>` (matched line by line on
 * comment- and literal-masked text).
 *
 * The scan is a pure function of (text, catalog). Malformed hints are
 * returned as DetectionErrors; the rule that carries them is skipped.
 */

import type { RuleCatalog } from '../catalog/rule_catalog.js';
import { DetectionError } from '../core/errors.js';
import type { Candidate, RuleDefinition, Span } from '../types.js';
import {
  escapeRegExp,
  findMatchingBracket,
  findStatementEnd,
  lineAt,
  maskSource,
  type MaskedSource,
} from './c_source.js';

export const BUILTIN_CONFIDENCE = 0.9;
export const REGEX_CONFIDENCE = 0.6;

// ============================================================================
// TYPES
// ============================================================================

export interface PatternMatch {
  span: Span;
  evidence: string;
}

/** Views of one file shared by every detector. */
export interface ScanContext {
  readonly source: string;
  /** Comments and literals blanked. */
  readonly masked: MaskedSource;
  /** Comments blanked, literals kept. */
  readonly code: MaskedSource;
  readonly maskedLines: readonly string[];
}

export type BuiltinDetector = (ctx: ScanContext) => PatternMatch[];

export type ParsedHint =
  | { kind: 'builtin'; name: string; detector: BuiltinDetector }
  | { kind: 'regex'; regex: RegExp };

export interface DetectionResult {
  candidates: Candidate[];
  errors: DetectionError[];
}

// ============================================================================
// BUILTIN DETECTORS
// ============================================================================

function singleLine(ctx: ScanContext, offset: number, evidence: string): PatternMatch {
  const line = lineAt(ctx.masked.lineStarts, offset);
  return { span: { startLine: line, endLine: line }, evidence };
}

const LOOP_INIT = /^\s*(?:[A-Za-z_][\w\s]*?[\s*]+)?([A-Za-z_]\w*)\s*=\s*0[uUlL]*\s*$/;

/**
 * `for (T i = 0; ...)` whose body divides by `i`. Matches that are guarded
 * (`i != 0`, `i > 0`, `if (i)`) on the same or the preceding line are skipped.
 */
function detectLoopIteratorDivisor(ctx: ScanContext): PatternMatch[] {
  const text = ctx.masked.text;
  const matches: PatternMatch[] = [];
  for (const loop of text.matchAll(/\bfor\s*\(/g)) {
    const open = (loop.index ?? 0) + loop[0].length - 1;
    const close = findMatchingBracket(text, open);
    if (close < 0) continue;
    const init = text.slice(open + 1, close).split(';')[0];
    const iterator = LOOP_INIT.exec(init)?.[1];
    if (!iterator) continue;

    const bodyEnd = findStatementEnd(text, close + 1);
    const body = text.slice(close + 1, bodyEnd + 1);
    const name = escapeRegExp(iterator);
    const divisor = new RegExp(`[/%]=?\\s*\\(*\\s*${name}\\b(?!\\s*(?:\\(|\\[|\\.|->))`, 'g');
    const guard = new RegExp(
      `\\b${name}\\s*(?:!=|>)\\s*0\\b|\\b0\\s*(?:!=|<)\\s*${name}\\b|\\bif\\s*\\(\\s*${name}\\s*\\)`,
    );
    const loopLine = lineAt(ctx.masked.lineStarts, open);

    for (const use of body.matchAll(divisor)) {
      const offset = close + 1 + (use.index ?? 0);
      const line = lineAt(ctx.masked.lineStarts, offset);
      const nearby = [ctx.maskedLines[line - 2] ?? '', ctx.maskedLines[line - 1] ?? ''].join('\n');
      if (guard.test(nearby)) continue;
      matches.push(
        singleLine(ctx, offset, `loop at line ${loopLine} starts ${iterator} at 0 and divides by it`),
      );
    }
  }
  return matches;
}

/** `name[]` declared inside a struct or union body. */
function detectFlexibleArrayMember(ctx: ScanContext): PatternMatch[] {
  const text = ctx.masked.text;
  const matches: PatternMatch[] = [];
  for (const aggregate of text.matchAll(/\b(?:struct|union)\b[^;{}()]*\{/g)) {
    const open = (aggregate.index ?? 0) + aggregate[0].length - 1;
    const close = findMatchingBracket(text, open);
    if (close < 0) continue;
    const body = text.slice(open, close);
    for (const member of body.matchAll(/([A-Za-z_]\w*)\s*\[\s*\]\s*;/g)) {
      matches.push(singleLine(ctx, open + (member.index ?? 0), `flexible array member ${member[1]}`));
    }
  }
  return matches;
}

const ALLOCATORS = new Set(['malloc', 'calloc', 'realloc']);
const CAST_EXPR =
  /\(\s*(?:(?:const|volatile)\s+)*(?:(?:struct|union|enum)\s+)?([A-Za-z_]\w*(?:\s+[A-Za-z_]\w*)*)\s*(?:const\s*)?\*+\s*\)\s*\(*\s*([A-Za-z_]\w*)(\s*\()?/g;

/** Explicit `(T *)x` where x is a `void *` declared earlier, or an allocator call. */
function detectVoidPointerCast(ctx: ScanContext): PatternMatch[] {
  const text = ctx.masked.text;
  const voidVars = new Map<string, number>();
  for (const decl of text.matchAll(/\bvoid\s*\*+\s*([A-Za-z_]\w*)\s*(?=[=;,)[])/g)) {
    if (!voidVars.has(decl[1])) voidVars.set(decl[1], decl.index ?? 0);
  }

  const matches: PatternMatch[] = [];
  for (const cast of text.matchAll(CAST_EXPR)) {
    const [, typeName, operand, call] = cast;
    if (typeName === 'void' || typeName === 'sizeof' || typeName === 'return') continue;
    const offset = cast.index ?? 0;
    const declaredAt = voidVars.get(operand);
    const fromVoidVar = !call && declaredAt !== undefined && declaredAt < offset;
    const fromAllocator = call !== undefined && ALLOCATORS.has(operand);
    if (fromVoidVar || fromAllocator) {
      matches.push(singleLine(ctx, offset, `cast of void pointer ${operand} to ${typeName} *`));
    }
  }
  return matches;
}

/** `strncpy(dst, ...)` with no `dst[...] = '\0'` (or `0`) on that line or the next two. */
function detectStrncpyUnterminated(ctx: ScanContext): PatternMatch[] {
  const text = ctx.masked.text;
  const codeLines = ctx.code.text.split('\n');
  const matches: PatternMatch[] = [];
  for (const call of text.matchAll(/\bstrncpy\s*\(/g)) {
    const open = (call.index ?? 0) + call[0].length - 1;
    const close = findMatchingBracket(text, open);
    if (close < 0) continue;
    const dst = firstArgument(text.slice(open + 1, close));
    if (!dst) continue;

    const line = lineAt(ctx.masked.lineStarts, open);
    const endLine = lineAt(ctx.masked.lineStarts, close);
    const window = codeLines.slice(line - 1, endLine + 2).join('\n');
    const terminator = new RegExp(`${escapeRegExp(dst)}\\s*\\[[^\\]]*\\]\\s*=\\s*(?:0\\b|'\\\\0')`);
    if (terminator.test(window)) continue;
    matches.push(singleLine(ctx, open, `strncpy into ${dst} without explicit NUL termination`));
  }
  return matches;
}

function firstArgument(args: string): string | undefined {
  let depth = 0;
  for (let i = 0; i < args.length; i++) {
    const ch = args[i];
    if (ch === '(' || ch === '[') depth++;
    else if (ch === ')' || ch === ']') depth--;
    else if (ch === ',' && depth === 0) {
      const arg = args.slice(0, i).trim();
      return arg.length > 0 ? arg : undefined;
    }
  }
  return undefined;
}

/** `#define _Name ...` */
function detectReservedMacroName(ctx: ScanContext): PatternMatch[] {
  const matches: PatternMatch[] = [];
  for (const define of ctx.masked.text.matchAll(/^[ \t]*#[ \t]*define[ \t]+(_\w*)/gm)) {
    matches.push(singleLine(ctx, define.index ?? 0, `macro ${define[1]} starts with an underscore`));
  }
  return matches;
}

const UNARY_CONTEXT = /(?:[=(,;{}!?:&|]|\breturn)\s*$/;

/** `f->x`, `*f`, or a dereferenced cast of `f`, where f is a `FILE *`. */
function detectFilePointerDeref(ctx: ScanContext): PatternMatch[] {
  const text = ctx.masked.text;
  const names = new Set<string>();
  for (const decl of text.matchAll(/\bFILE\s*\*+\s*(?:const\s+)?([A-Za-z_]\w*)/g)) {
    names.add(decl[1]);
  }

  const matches: PatternMatch[] = [];
  for (const name of names) {
    const id = escapeRegExp(name);
    for (const arrow of text.matchAll(new RegExp(`\\b${id}\\s*->`, 'g'))) {
      matches.push(singleLine(ctx, arrow.index ?? 0, `member access through FILE pointer ${name}`));
    }
    for (const star of text.matchAll(new RegExp(`\\*\\s*${id}\\b(?!\\s*(?:\\(|\\[))`, 'g'))) {
      const offset = star.index ?? 0;
      const before = text.slice(Math.max(0, offset - 40), offset);
      if (/\bFILE\s*$/.test(before) || !UNARY_CONTEXT.test(before)) continue;
      matches.push(singleLine(ctx, offset, `dereference of FILE pointer ${name}`));
    }
    const castDeref = new RegExp(
      `\\*\\s*\\(*\\s*\\(\\s*[A-Za-z_][\\w\\s]*\\*+\\s*\\)\\s*${id}\\b|\\(\\s*[A-Za-z_][\\w\\s]*\\*+\\s*\\)\\s*${id}\\s*\\)\\s*(?:->|\\[)`,
      'g',
    );
    for (const cast of text.matchAll(castDeref)) {
      matches.push(singleLine(ctx, cast.index ?? 0, `dereference of a cast of FILE pointer ${name}`));
    }
  }
  return matches;
}

export const BUILTIN_DETECTORS: Readonly<Record<string, BuiltinDetector>> = Object.freeze({
  'loop-iterator-divisor': detectLoopIteratorDivisor,
  'flexible-array-member': detectFlexibleArrayMember,
  'void-pointer-cast': detectVoidPointerCast,
  'strncpy-unterminated': detectStrncpyUnterminated,
  'reserved-macro-name': detectReservedMacroName,
  'file-pointer-deref': detectFilePointerDeref,
});

// ============================================================================
// HINT PARSING
// ============================================================================

/** Render a hint entry for messages and listings. */
export function formatHint(hint: unknown): string {
  if (typeof hint === 'string') return hint;
  const json = JSON.stringify(hint);
  return json === undefined ? String(hint) : json;
}

/**
 * Parse one hint. Throws DetectionError for entries that are not strings,
 * unknown kinds, unknown builtins and patterns that do not compile.
 */
export function parseDetectionHint(ruleId: string, entry: unknown): ParsedHint {
  if (typeof entry !== 'string') {
    const shape = entry === null ? 'null' : Array.isArray(entry) ? 'a list' : typeof entry === 'object' ? 'a mapping' : typeof entry;
    throw new DetectionError(ruleId, formatHint(entry), `expected a string, got ${shape} (quote hints that contain ": ")`);
  }
  const hint = entry;
  const separator = hint.indexOf(':');
  if (separator <= 0) {
    throw new DetectionError(ruleId, hint, 'expected builtin:<name> or regex:<pattern>');
  }
  const kind = hint.slice(0, separator).trim().toLowerCase();
  const value = hint.slice(separator + 1);

  if (kind === 'builtin') {
    const name = value.trim();
    const detector = Object.hasOwn(BUILTIN_DETECTORS, name) ? BUILTIN_DETECTORS[name] : undefined;
    if (!detector) {
      throw new DetectionError(ruleId, hint, `unknown builtin detector "${name}"`);
    }
    return { kind: 'builtin', name, detector };
  }

  if (kind === 'regex') {
    let pattern = value;
    let flags = '';
    const literal = /^\/(.*)\/([a-z]*)$/s.exec(value);
    if (literal) {
      pattern = literal[1];
      // Matching is per line and stateless.
      flags = literal[2].replace(/[gy]/g, '');
    }
    if (pattern.length === 0) {
      throw new DetectionError(ruleId, hint, 'empty pattern');
    }
    try {
      return { kind: 'regex', regex: new RegExp(pattern, flags) };
    } catch (error) {
      throw new DetectionError(ruleId, hint, error instanceof Error ? error.message : String(error));
    }
  }

  throw new DetectionError(ruleId, hint, `unknown hint kind "${kind}"`);
}

// ============================================================================
// SCAN
// ============================================================================

export function createScanContext(source: string): ScanContext {
  const masked = maskSource(source);
  return {
    source,
    masked,
    code: maskSource(source, { keepLiterals: true }),
    maskedLines: masked.text.split('\n'),
  };
}

function runHint(ctx: ScanContext, hint: ParsedHint): Array<PatternMatch & { confidence: number }> {
  if (hint.kind === 'builtin') {
    return hint.detector(ctx).map((match) => ({ ...match, confidence: BUILTIN_CONFIDENCE }));
  }
  const matches: Array<PatternMatch & { confidence: number }> = [];
  ctx.maskedLines.forEach((line, index) => {
    if (hint.regex.test(line)) {
      matches.push({
        span: { startLine: index + 1, endLine: index + 1 },
        evidence: `matches /${hint.regex.source}/`,
        confidence: REGEX_CONFIDENCE,
      });
    }
  });
  return matches;
}

/**
 * Scan one file. Candidates are sorted by (startLine, catalog order,
 * endLine) and unique per (ruleId, span); different rules may overlap.
 */
export function detectCandidates(fileId: string, source: string, catalog: RuleCatalog): DetectionResult {
  const ctx = createScanContext(source);
  const errors: DetectionError[] = [];
  const byKey = new Map<string, Candidate>();

  for (const rule of catalog.all()) {
    const hints = parseRuleHints(rule, errors);
    if (!hints) continue;
    for (const hint of hints) {
      for (const match of runHint(ctx, hint)) {
        const key = `${rule.id}@${match.span.startLine}-${match.span.endLine}`;
        const existing = byKey.get(key);
        if (existing && existing.confidence >= match.confidence) continue;
        byKey.set(key, {
          ruleId: rule.id,
          fileId,
          span: match.span,
          source: 'PATTERN',
          confidence: match.confidence,
          evidence: match.evidence,
        });
      }
    }
  }

  const candidates = [...byKey.values()].sort(
    (a, b) =>
      a.span.startLine - b.span.startLine ||
      catalog.orderOf(a.ruleId) - catalog.orderOf(b.ruleId) ||
      a.span.endLine - b.span.endLine,
  );
  return { candidates, errors };
}

function parseRuleHints(rule: RuleDefinition, errors: DetectionError[]): ParsedHint[] | null {
  const parsed: ParsedHint[] = [];
  for (const hint of rule.detectionHints) {
    try {
      parsed.push(parseDetectionHint(rule.id, hint));
    } catch (error) {
      if (!(error instanceof DetectionError)) throw error;
      errors.push(error);
      return null;
    }
  }
  return parsed;
}
