/**
 * @fileoverview Structured engine replies
 *
 * Confirm and abstain replies carry one JSON object, usually inside a
 * fenced block and surrounded by prose. The object is pulled out and
 * checked with zod before anything reads it.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { Err, Ok, type Result } from '../core/result.js';
import { getErrorMessage } from './errors.js';

/** Any schema producing T, whatever its input type (defaults, transforms). */
export type ReplySchema<T> = ZodType<T, ZodTypeDef, unknown>;

export class OutputValidationError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = [],
    public readonly rawOutput?: string,
  ) {
    super(message);
    this.name = 'OutputValidationError';
  }
}

const FENCED_JSON = /```(?:json)?\s*\n?([\s\S]*?)\n?```/;
const OUTERMOST_OBJECT = /\{[\s\S]*\}/;

/** JSON text of a reply: the first fenced block, else the outermost object. */
export function extractJSON(text: string): string {
  const fenced = FENCED_JSON.exec(text);
  if (fenced) return fenced[1].trim();
  const object = OUTERMOST_OBJECT.exec(text);
  return object ? object[0] : text.trim();
}

export function readReply<T>(reply: string, schema: ReplySchema<T>): Result<T, OutputValidationError> {
  let json: unknown;
  try {
    json = JSON.parse(extractJSON(reply));
  } catch (error) {
    return Err(new OutputValidationError('Reply is not JSON', [getErrorMessage(error)], reply));
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.errors.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    return Err(new OutputValidationError('Reply does not match the expected shape', details, reply));
  }
  return Ok(parsed.data);
}

/** Like readReply, but throws the OutputValidationError. */
export function parseReply<T>(reply: string, schema: ReplySchema<T>): T {
  const result = readReply(reply, schema);
  if (!result.ok) throw result.error;
  return result.value;
}
