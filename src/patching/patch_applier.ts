/**
 * @fileoverview Patch Applier
 *
 * Owns the working buffer of one file and the lifecycle of every
 * remediation group submitted against it:
 *
 *   PENDING -> VALIDATING -> APPLIED | REJECTED | CONFLICT | ADVISED
 *   PENDING -> ABSTAINED
 *   APPLIED -> REJECTED            (verification hook failed at commit)
 *   APPLIED -> ABSTAINED           (file abandoned before commit)
 *
 * Diffs are addressed in current-buffer coordinates: every request is built
 * from the buffer as earlier groups left it. The buffer keeps, per line, the
 * original line it came from and the group that last wrote it, which is
 * how spans are remapped and how cross-group edits are caught. It also
 * keeps each line's terminator, so a mixed LF/CRLF file is written back
 * with untouched lines ending exactly as they did.
 *
 * Nothing reaches disk until commit(), and commit() refuses to run while
 * any group is still in flight.
 */

import { PatchConflictError, PipelineError, ValidationViolationError } from '../core/errors.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import type {
  FixMode,
  GroupOutcome,
  GroupState,
  PatchResult,
  PatchStatus,
  Span,
  TerminalGroupState,
  Violation,
} from '../types.js';
import { formatSpan, splitLines } from '../utils/source_lines.js';
import type { SourceWriter } from './source_writer.js';
import { fileDiff, formatUnifiedDiff, isBlankDiff, parseSingleFileDiff, type DiffHunk } from './unified_diff.js';
import type { VerifyHook } from './verify_hook.js';

// ============================================================================
// STATE MACHINE
// ============================================================================

const TRANSITIONS: Readonly<Record<GroupState, readonly GroupState[]>> = {
  PENDING: ['VALIDATING', 'ABSTAINED'],
  VALIDATING: ['APPLIED', 'REJECTED', 'CONFLICT', 'ADVISED'],
  APPLIED: ['REJECTED', 'ABSTAINED'],
  REJECTED: [],
  CONFLICT: [],
  ABSTAINED: [],
  ADVISED: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly groupId: string,
    readonly from: GroupState,
    readonly to: GroupState,
  ) {
    super(`Group ${groupId}: illegal transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

function isTerminal(state: GroupState): state is TerminalGroupState {
  return state !== 'PENDING' && state !== 'VALIDATING';
}

/** File status when several groups end differently; first match wins. */
const STATUS_PRECEDENCE: readonly TerminalGroupState[] = ['APPLIED', 'ADVISED', 'CONFLICT', 'REJECTED', 'ABSTAINED'];

type LineEnding = '\n' | '\r\n';

function firstLineEnding(text: string): LineEnding {
  const newline = text.indexOf('\n');
  return newline > 0 && text[newline - 1] === '\r' ? '\r\n' : '\n';
}

/** Terminator of each line; an unterminated last line gets `fallback`. */
function lineEndings(original: string, count: number, fallback: LineEnding): LineEnding[] {
  const raw = original.split('\n');
  return raw.slice(0, count).map((line, index) => {
    if (index === raw.length - 1) return fallback;
    return line.endsWith('\r') ? '\r\n' : '\n';
  });
}

interface GroupRecord {
  groupId: string;
  violations: Violation[];
  state: GroupState;
  diffText: string;
  reason?: string;
  attempts: number;
}

// ============================================================================
// APPLIER
// ============================================================================

export interface PatchApplierOptions {
  fileId: string;
  filePath: string;
  /** File content exactly as read from disk. */
  original: string;
  mode: FixMode;
  writer: SourceWriter;
  verify?: VerifyHook;
}

export class PatchApplier {
  private readonly groups = new Map<string, GroupRecord>();
  /** Terminator for lines inserted with no neighbour to copy from. */
  private readonly defaultEol: LineEnding;
  private readonly trailingNewline: boolean;
  private readonly originalLf: string;
  private lines: string[];
  /** Original line number per buffer line; null for inserted lines. */
  private origin: Array<number | null>;
  /** Group that last wrote each buffer line. */
  private touchedBy: Array<string | null>;
  private eols: LineEnding[];
  private committed: PatchResult | null = null;

  constructor(private readonly options: PatchApplierOptions) {
    this.defaultEol = firstLineEnding(options.original);
    this.originalLf = options.original.replace(/\r\n/g, '\n');
    this.trailingNewline = this.originalLf.length === 0 || this.originalLf.endsWith('\n');
    this.lines = [];
    this.origin = [];
    this.touchedBy = [];
    this.eols = [];
    this.resetBuffer();
  }

  get lineCount(): number {
    return this.lines.length;
  }

  /** Current buffer lines (LF, no terminators). */
  currentLines(): readonly string[] {
    return this.lines;
  }

  stateOf(groupId: string): GroupState | undefined {
    return this.groups.get(groupId)?.state;
  }

  /**
   * Where an original span sits in the current buffer. Lines inserted
   * directly before the span are not part of it.
   */
  mapSpan(span: Span): Span {
    let start = this.lines.length + 1;
    for (let i = 0; i < this.origin.length; i++) {
      const line = this.origin[i];
      if (line !== null && line >= span.startLine) {
        start = i + 1;
        break;
      }
    }
    let end = start;
    for (let i = this.origin.length - 1; i >= 0; i--) {
      const line = this.origin[i];
      if (line !== null && line <= span.endLine) {
        end = Math.max(start, i + 1);
        break;
      }
    }
    const last = Math.max(1, this.lines.length);
    return { startLine: Math.min(start, last), endLine: Math.min(end, last) };
  }

  /** Current-buffer spans of a registered group's violations. */
  currentSpans(groupId: string): Span[] {
    return this.require(groupId).violations.map((violation) => this.mapSpan(violation.span));
  }

  register(groupId: string, violations: readonly Violation[]): void {
    if (this.committed) {
      throw new PipelineError(`Cannot register group ${groupId} after commit`);
    }
    if (this.groups.has(groupId)) {
      throw new PipelineError(`Group ${groupId} is already registered`);
    }
    this.groups.set(groupId, { groupId, violations: [...violations], state: 'PENDING', diffText: '', attempts: 0 });
  }

  abstain(groupId: string, reason: string, attempts = 0): GroupOutcome {
    const group = this.require(groupId);
    this.transition(group, 'ABSTAINED');
    group.reason = reason;
    group.attempts = attempts;
    logInfo('Applier: group abstained', { file: this.options.fileId, groupId, reason });
    return this.outcomeOf(group);
  }

  /**
   * Validate `diffText` against the current buffer and, when it passes,
   * apply it all-or-nothing (or record it as advice in ADVISE mode).
   */
  submit(groupId: string, diffText: string, attempts = 1): GroupOutcome {
    const group = this.require(groupId);
    group.attempts = attempts;

    let hunks: DiffHunk[] = [];
    let parseError: ValidationViolationError | null = null;
    try {
      hunks = parseSingleFileDiff(groupId, diffText).hunks;
    } catch (error) {
      if (!(error instanceof ValidationViolationError)) throw error;
      parseError = error;
    }
    const changes = hunks.some((hunk) => hunk.lines.some((line) => line[0] !== ' '));
    if (!parseError && (isBlankDiff(diffText) || !changes)) {
      return this.abstain(groupId, 'empty diff', attempts);
    }

    this.transition(group, 'VALIDATING');
    try {
      if (parseError) throw parseError;
      const ordered = [...hunks].sort((a, b) => a.oldStart - b.oldStart);
      this.checkAgainstBuffer(groupId, ordered);
      if (this.options.mode === 'STRICT') {
        this.checkStrictScope(groupId, ordered, this.currentSpans(groupId));
      }

      group.diffText = formatUnifiedDiff(this.options.fileId, ordered);
      if (this.options.mode === 'ADVISE') {
        this.transition(group, 'ADVISED');
        return this.outcomeOf(group);
      }

      this.apply(groupId, ordered);
      this.transition(group, 'APPLIED');
      logInfo('Applier: group applied', { file: this.options.fileId, groupId, hunks: ordered.length });
      return this.outcomeOf(group);
    } catch (error) {
      if (error instanceof PatchConflictError) {
        group.diffText = diffText;
        group.reason = error.message;
        this.transition(group, 'CONFLICT');
      } else if (error instanceof ValidationViolationError) {
        group.diffText = diffText;
        group.reason = error.message;
        this.transition(group, 'REJECTED');
      } else {
        throw error;
      }
      logWarning('Applier: group not applied', { file: this.options.fileId, groupId, state: group.state, reason: group.reason });
      return this.outcomeOf(group);
    }
  }

  outcomes(): GroupOutcome[] {
    return [...this.groups.values()].map((group) => this.outcomeOf(group));
  }

  /**
   * Finish the file: optional verification, write when changed, and the
   * frozen PatchResult. Throws while any group is not terminal. With
   * `abandon`, applied groups fall back to ABSTAINED under that reason and
   * nothing is written.
   */
  async commit(options: { abandon?: string } = {}): Promise<PatchResult> {
    if (this.committed) return this.committed;
    const open = [...this.groups.values()].filter((group) => !isTerminal(group.state));
    if (open.length > 0) {
      throw new PipelineError(
        `Cannot commit ${this.options.fileId}: groups not terminal: ${open.map((group) => `${group.groupId}=${group.state}`).join(', ')}`,
      );
    }

    if (options.abandon !== undefined) {
      for (const group of this.groups.values()) {
        if (group.state === 'APPLIED') {
          this.transition(group, 'ABSTAINED');
          group.reason = options.abandon;
        }
      }
      this.resetBuffer();
    }

    let finalLf = this.renderLf();
    const changed = this.options.mode !== 'ADVISE' && finalLf !== this.originalLf;

    if (changed && this.options.verify) {
      const outcome = await this.options.verify(this.options.filePath, this.renderText());
      if (!outcome.ok) {
        const reason = `verification failed: ${outcome.detail ?? 'verify command failed'}`;
        for (const group of this.groups.values()) {
          if (group.state === 'APPLIED') {
            this.transition(group, 'REJECTED');
            group.reason = reason;
          }
        }
        logWarning('Applier: verification failed, nothing written', { file: this.options.fileId, reason });
        this.resetBuffer();
        finalLf = this.originalLf;
      }
    }

    const diffText = this.options.mode === 'ADVISE' ? '' : fileDiff(this.options.fileId, this.originalLf, finalLf);
    if (diffText) {
      await this.options.writer.write(this.options.filePath, this.renderText());
      logInfo('Applier: file written', { file: this.options.fileId });
    }

    const groups = this.outcomes();
    const status = this.fileStatus(groups);
    const reasonSource = groups.find((group) => group.status === status && group.reason);
    const appliedSpans = groups
      .filter((group) => group.status === 'APPLIED')
      .flatMap((group) => group.appliedSpans)
      .sort((a, b) => a.startLine - b.startLine);

    this.committed = Object.freeze({
      fileId: this.options.fileId,
      diffText,
      appliedSpans: Object.freeze(appliedSpans),
      status,
      groups: Object.freeze(groups),
      reason: status === 'APPLIED' || status === 'CLEAN' ? undefined : reasonSource?.reason,
    });
    return this.committed;
  }

  /** Final buffer text, each line with its own terminator. */
  renderText(): string {
    return this.lines
      .map((line, index) => (index < this.lines.length - 1 || this.trailingNewline ? `${line}${this.eols[index]}` : line))
      .join('');
  }

  // --------------------------------------------------------------------------
  // internals
  // --------------------------------------------------------------------------

  private require(groupId: string): GroupRecord {
    const group = this.groups.get(groupId);
    if (!group) {
      throw new PipelineError(`Unknown group ${groupId}`);
    }
    return group;
  }

  private transition(group: GroupRecord, to: GroupState): void {
    if (!TRANSITIONS[group.state].includes(to)) {
      throw new IllegalTransitionError(group.groupId, group.state, to);
    }
    logDebug('Applier: transition', { groupId: group.groupId, from: group.state, to });
    group.state = to;
  }

  private outcomeOf(group: GroupRecord): GroupOutcome {
    if (!isTerminal(group.state)) {
      throw new PipelineError(`Group ${group.groupId} is still ${group.state}`);
    }
    return {
      groupId: group.groupId,
      violationIds: group.violations.map((violation) => violation.id),
      status: group.state,
      diffText: group.diffText,
      appliedSpans: group.state === 'APPLIED' ? group.violations.map((violation) => ({ ...violation.span })) : [],
      reason: group.reason,
      attempts: group.attempts,
    };
  }

  private fileStatus(groups: readonly GroupOutcome[]): PatchStatus {
    if (groups.length === 0) return 'CLEAN';
    for (const status of STATUS_PRECEDENCE) {
      if (groups.some((group) => group.status === status)) return status;
    }
    return 'ABSTAINED';
  }

  /** Context and removed lines must match exactly; hunks may not overlap or reuse another group's lines. */
  private checkAgainstBuffer(groupId: string, hunks: readonly DiffHunk[]): void {
    let previousEnd = 0;
    for (const hunk of hunks) {
      if (hunk.oldStart < previousEnd) {
        throw new PatchConflictError(groupId, `hunks overlap at line ${hunk.oldStart}`, hunk.oldStart);
      }
      previousEnd = hunk.oldStart + hunk.oldLines;

      let pos = hunk.oldStart;
      for (const line of hunk.lines) {
        const marker = line[0];
        if (marker === '+') continue;
        const expected = line.slice(1);
        const actual = this.lines[pos - 1];
        if (actual === undefined) {
          throw new PatchConflictError(groupId, `line ${pos} is past the end of the file`, pos);
        }
        if (actual !== expected) {
          throw new PatchConflictError(
            groupId,
            `line ${pos} does not match: expected ${JSON.stringify(expected)}, found ${JSON.stringify(actual)}`,
            pos,
          );
        }
        const owner = this.touchedBy[pos - 1];
        if (marker === '-' && owner !== null && owner !== groupId) {
          throw new PatchConflictError(groupId, `line ${pos} was already changed by ${owner}`, pos);
        }
        pos++;
      }
    }
  }

  /**
   * Removed lines must lie inside a span; inserted lines must be anchored
   * inside a span or directly after one.
   */
  private checkStrictScope(groupId: string, hunks: readonly DiffHunk[], spans: readonly Span[]): void {
    const outside: number[] = [];
    for (const hunk of hunks) {
      let pos = hunk.oldStart;
      for (const line of hunk.lines) {
        const marker = line[0];
        if (marker === '+') {
          if (!spans.some((span) => span.startLine <= pos && pos <= span.endLine + 1)) outside.push(pos);
          continue;
        }
        if (marker === '-' && !spans.some((span) => span.startLine <= pos && pos <= span.endLine)) {
          outside.push(pos);
        }
        pos++;
      }
    }
    if (outside.length > 0) {
      const lines = [...new Set(outside)].sort((a, b) => a - b);
      throw new ValidationViolationError(
        groupId,
        `STRICT mode: edits at line(s) ${lines.join(', ')} fall outside ${spans.map(formatSpan).join(', ')}`,
        lines,
      );
    }
  }

  private apply(groupId: string, hunks: readonly DiffHunk[]): void {
    let delta = 0;
    for (const hunk of hunks) {
      const at = hunk.oldStart - 1 + delta;
      const newLines: string[] = [];
      const newOrigin: Array<number | null> = [];
      const newTouched: Array<string | null> = [];
      const newEols: LineEnding[] = [];
      // Inserted lines copy the terminator of the line they follow or replace.
      let lastEol: LineEnding | undefined = at > 0 ? this.eols[at - 1] : undefined;
      let pos = at;
      for (const line of hunk.lines) {
        const marker = line[0];
        if (marker === ' ') {
          newLines.push(this.lines[pos]);
          newOrigin.push(this.origin[pos]);
          newTouched.push(this.touchedBy[pos]);
          newEols.push(this.eols[pos]);
          lastEol = this.eols[pos];
          pos++;
        } else if (marker === '-') {
          lastEol = this.eols[pos];
          pos++;
        } else {
          const eol = lastEol ?? (pos < this.eols.length ? this.eols[pos] : this.defaultEol);
          newLines.push(line.slice(1));
          newOrigin.push(null);
          newTouched.push(groupId);
          newEols.push(eol);
          lastEol = eol;
        }
      }
      this.lines.splice(at, hunk.oldLines, ...newLines);
      this.origin.splice(at, hunk.oldLines, ...newOrigin);
      this.touchedBy.splice(at, hunk.oldLines, ...newTouched);
      this.eols.splice(at, hunk.oldLines, ...newEols);
      delta += newLines.length - hunk.oldLines;
    }
  }

  private resetBuffer(): void {
    this.lines = splitLines(this.originalLf);
    this.origin = this.lines.map((_, index) => index + 1);
    this.touchedBy = this.lines.map(() => null);
    this.eols = lineEndings(this.options.original, this.lines.length, this.defaultEol);
  }

  private renderLf(): string {
    if (this.lines.length === 0) return '';
    const body = this.lines.join('\n');
    return this.trailingNewline ? `${body}\n` : body;
  }
}
