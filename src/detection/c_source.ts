/**
 * @fileoverview Lightweight C source scanning helpers
 *
 * Not a parser. The detectors only need comments and literals blanked out
 * (so `//` in a string or `/ i` in a comment never match) and bracket
 * matching over the result. Masking keeps every newline and the total
 * length, so offsets and line numbers in masked text equal the original.
 */

export interface MaskedSource {
  /** Original text with comments, string and char literals replaced by spaces. */
  readonly text: string;
  /** Offset of the first character of each line (index 0 = line 1). */
  readonly lineStarts: readonly number[];
}

export interface MaskOptions {
  /** Keep string and char literals verbatim; only comments are blanked. */
  keepLiterals?: boolean;
}

/**
 * Blank out comments and string/char literal contents.
 * Literal delimiters are kept so `"..."` still reads as an expression.
 */
export function maskSource(source: string, options: MaskOptions = {}): MaskedSource {
  const out: string[] = [];
  let i = 0;
  const n = source.length;

  const blank = (ch: string): string => (ch === '\n' || ch === '\r' ? ch : ' ');

  while (i < n) {
    const ch = source[i];
    const next = i + 1 < n ? source[i + 1] : '';

    if (ch === '/' && next === '*') {
      out.push('  ');
      i += 2;
      while (i < n && !(source[i] === '*' && source[i + 1] === '/')) {
        out.push(blank(source[i]));
        i++;
      }
      if (i < n) {
        out.push('  ');
        i += 2;
      }
      continue;
    }

    if (ch === '/' && next === '/') {
      while (i < n && source[i] !== '\n') {
        // Backslash-newline continues a line comment.
        if (source[i] === '\\' && source[i + 1] === '\n') {
          out.push(' \n');
          i += 2;
          continue;
        }
        out.push(blank(source[i]));
        i++;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      // Literal bodies are still walked when kept, so `"/*"` never opens a comment.
      const keep = options.keepLiterals === true;
      const quote = ch;
      out.push(quote);
      i++;
      while (i < n && source[i] !== quote && source[i] !== '\n') {
        if (source[i] === '\\' && i + 1 < n) {
          out.push(keep ? source[i] : ' ', keep ? source[i + 1] : blank(source[i + 1]));
          i += 2;
          continue;
        }
        out.push(keep ? source[i] : ' ');
        i++;
      }
      if (i < n && source[i] === quote) {
        out.push(quote);
        i++;
      }
      continue;
    }

    out.push(ch);
    i++;
  }

  const text = out.join('');
  return { text, lineStarts: computeLineStarts(text) };
}

export function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') starts.push(i + 1);
  }
  return starts;
}

/** 1-based line number containing `offset`. */
export function lineAt(lineStarts: readonly number[], offset: number): number {
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lineStarts[mid] <= offset) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  return lo + 1;
}

const CLOSERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };

/**
 * Offset of the bracket closing the one at `openIndex`, or -1 when the
 * text ends first. Expects masked text.
 */
export function findMatchingBracket(text: string, openIndex: number): number {
  const open = text[openIndex];
  const close = CLOSERS[open];
  if (!close) return -1;
  let depth = 0;
  for (let i = openIndex; i < text.length; i++) {
    if (text[i] === open) depth++;
    else if (text[i] === close) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * End offset (inclusive) of the statement starting at `start`: the first
 * `;` outside brackets, or the closing brace of a leading block.
 */
export function findStatementEnd(text: string, start: number): number {
  let i = start;
  while (i < text.length && /\s/.test(text[i])) i++;
  if (text[i] === '{') return findMatchingBracket(text, i);
  let depth = 0;
  for (; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth--;
    else if (ch === ';' && depth <= 0) return i;
    if (depth < 0) return i - 1;
  }
  return text.length - 1;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
