/**
 * @fileoverview Unified diff helpers over the `diff` package
 *
 * Engine output is untrusted text. Everything here either produces a
 * well-formed single-file hunk list or throws ValidationViolationError.
 */

import { createTwoFilesPatch, parsePatch, structuredPatch, type ParsedDiff } from 'diff';
import { ValidationViolationError } from '../core/errors.js';
import type { ContextWindow } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';

/** Starts follow parsePatch: a zero-length range starts at the line after it. */
export interface DiffHunk {
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  /** Body lines with their ' ', '-' or '+' marker. */
  lines: string[];
}

export interface FileDiff {
  oldFileName?: string;
  newFileName?: string;
  hunks: DiffHunk[];
}

const BINARY_MARKERS = /^(?:Binary files .* differ|GIT binary patch)\s*$/m;

export function isBlankDiff(diffText: string): boolean {
  return diffText.trim().length === 0;
}

/**
 * Parse engine output that must touch exactly one file. Returns a FileDiff
 * with no hunks for a blank diff.
 */
export function parseSingleFileDiff(groupId: string, diffText: string): FileDiff {
  if (diffText.includes('\0')) {
    throw new ValidationViolationError(groupId, 'diff contains NUL bytes');
  }
  if (BINARY_MARKERS.test(diffText)) {
    throw new ValidationViolationError(groupId, 'binary diffs are not accepted');
  }
  if (isBlankDiff(diffText)) {
    return { hunks: [] };
  }

  let parsed: ParsedDiff[];
  try {
    parsed = parsePatch(diffText.replace(/\r\n/g, '\n'));
  } catch (error) {
    throw new ValidationViolationError(groupId, `unparseable diff: ${getErrorMessage(error)}`);
  }

  const sections = parsed.filter((section) => section.hunks.length > 0);
  if (sections.length > 1) {
    throw new ValidationViolationError(groupId, `diff touches ${sections.length} files; expected one`);
  }
  if (sections.length === 0) {
    // Headers without hunks, or text that is not a diff at all.
    if (parsed.some((section) => section.oldFileName || section.newFileName)) {
      return { hunks: [] };
    }
    throw new ValidationViolationError(groupId, 'no diff hunks found');
  }

  const [section] = sections;
  const hunks = section.hunks.map((hunk, index) => {
    // An empty body line is a context line whose leading space was stripped.
    const lines = hunk.lines.filter((line) => !line.startsWith('\\')).map((line) => (line === '' ? ' ' : line));
    let oldCount = 0;
    let newCount = 0;
    for (const line of lines) {
      const marker = line[0];
      if (marker === ' ') {
        oldCount++;
        newCount++;
      } else if (marker === '-') {
        oldCount++;
      } else if (marker === '+') {
        newCount++;
      } else {
        throw new ValidationViolationError(groupId, `hunk ${index + 1} has a line without a diff marker`);
      }
    }
    if (oldCount !== hunk.oldLines || newCount !== hunk.newLines) {
      throw new ValidationViolationError(groupId, `hunk ${index + 1} header counts do not match its lines`);
    }
    return {
      oldStart: hunk.oldStart,
      oldLines: hunk.oldLines,
      newStart: hunk.newStart,
      newLines: hunk.newLines,
      lines,
    };
  });

  return { oldFileName: section.oldFileName, newFileName: section.newFileName, hunks };
}

/** Inverse of parseSingleFileDiff: a zero-length range is written as the line before it. */
export function formatUnifiedDiff(fileName: string, hunks: readonly DiffHunk[]): string {
  if (hunks.length === 0) return '';
  const out = [`--- a/${fileName}`, `+++ b/${fileName}`];
  for (const hunk of hunks) {
    const oldStart = hunk.oldLines === 0 ? hunk.oldStart - 1 : hunk.oldStart;
    const newStart = hunk.newLines === 0 ? hunk.newStart - 1 : hunk.newStart;
    out.push(`@@ -${oldStart},${hunk.oldLines} +${newStart},${hunk.newLines} @@`, ...hunk.lines);
  }
  return `${out.join('\n')}\n`;
}

function withTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

/**
 * Diff that turns `window` into `replacement`, in file coordinates.
 * Empty string when nothing changes.
 */
export function windowReplacementDiff(fileName: string, window: ContextWindow, replacement: string): string {
  const before = withTrailingNewline(window.text.replace(/\r\n/g, '\n'));
  const after = withTrailingNewline(replacement.replace(/\r\n/g, '\n'));
  if (before === after) return '';

  const offset = window.startLine - 1;
  const patch = structuredPatch(fileName, fileName, before, after, '', '', { context: 3 });
  const hunks = patch.hunks.map((hunk) => ({
    oldStart: hunk.oldStart + offset,
    oldLines: hunk.oldLines,
    newStart: hunk.newStart + offset,
    newLines: hunk.newLines,
    lines: hunk.lines.filter((line) => !line.startsWith('\\')),
  }));
  return formatUnifiedDiff(fileName, hunks);
}

/** Whole-file diff between two texts; empty string when they are equal. */
export function fileDiff(fileName: string, original: string, updated: string): string {
  if (original === updated) return '';
  return createTwoFilesPatch(`a/${fileName}`, `b/${fileName}`, original, updated, '', '', { context: 3 });
}
