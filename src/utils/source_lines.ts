/**
 * @fileoverview Line-oriented views of source text
 */

import type { ContextWindow, Span } from '../types.js';

/**
 * Split text into lines. A trailing newline does not produce an extra
 * empty line; CRLF is treated as LF.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.replace(/\r\n/g, '\n').split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export function clampSpan(span: Span, lineCount: number, padding = 0): Span {
  const last = Math.max(1, lineCount);
  return {
    startLine: Math.min(last, Math.max(1, span.startLine - padding)),
    endLine: Math.min(last, Math.max(1, span.endLine + padding)),
  };
}

/** Lines `startLine..endLine` (1-based, inclusive), each newline-terminated. */
export function sliceWindow(lines: readonly string[], startLine: number, endLine: number): ContextWindow {
  const body = lines.slice(startLine - 1, endLine);
  return { startLine, endLine, text: body.length > 0 ? `${body.join('\n')}\n` : '' };
}

/** Sort and merge spans that overlap or sit within `gap` lines of each other. */
export function mergeSpans(spans: readonly Span[], gap = 0): Span[] {
  const sorted = [...spans].sort((a, b) => a.startLine - b.startLine || a.endLine - b.endLine);
  const merged: Span[] = [];
  for (const span of sorted) {
    const last = merged[merged.length - 1];
    if (last && span.startLine - last.endLine <= gap + 1) {
      last.endLine = Math.max(last.endLine, span.endLine);
    } else {
      merged.push({ ...span });
    }
  }
  return merged;
}

export function spansOverlap(a: Span, b: Span): boolean {
  return a.startLine <= b.endLine && b.startLine <= a.endLine;
}

export function formatSpan(span: Span): string {
  return span.startLine === span.endLine ? `L${span.startLine}` : `L${span.startLine}-L${span.endLine}`;
}
