import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { OutputValidationError, extractJSON, parseReply, readReply } from '../output_validator.js';

const AbstainSchema = z.object({ abstain: z.literal(true), reason: z.string() });

describe('extractJSON', () => {
  it('prefers a fenced block over surrounding prose', () => {
    expect(extractJSON('Here you go:\n```json\n{"abstain": true, "reason": "macro"}\n```\nThanks')).toBe(
      '{"abstain": true, "reason": "macro"}',
    );
  });

  it('falls back to the outermost object', () => {
    expect(extractJSON('verdicts follow {"verdicts": []} done')).toBe('{"verdicts": []}');
  });
});

describe('readReply', () => {
  it('returns the parsed value', () => {
    expect(readReply('{"abstain": true, "reason": "macro"}', AbstainSchema)).toEqual({
      ok: true,
      value: { abstain: true, reason: 'macro' },
    });
  });

  it('reports text that is not JSON', () => {
    const result = readReply('no idea', AbstainSchema);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Reply is not JSON');
      expect(result.error.rawOutput).toBe('no idea');
    }
  });

  it('lists the paths that fail the schema', () => {
    const result = readReply('{"abstain": true}', AbstainSchema);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Reply does not match the expected shape');
      expect(result.error.details).toEqual(['reason: Required']);
    }
  });
});

describe('parseReply', () => {
  it('throws OutputValidationError on a bad reply', () => {
    expect(() => parseReply('{"abstain": false, "reason": "x"}', AbstainSchema)).toThrow(OutputValidationError);
  });
});
