/**
 * @fileoverview Markdown knowledge base source
 *
 * One rule per `<RULE.ID>.md` file. The file stem is the rule id, file-name
 * order is catalog order. An optional YAML front matter block carries the
 * machine-readable fields:
 *
 * ```markdown
 * ---
 * severity: HIGH_CRITICAL
 * title: Division by a loop iterator that starts at zero
 * hints:
 *   - builtin:loop-iterator-divisor
 * ---
 * # DBZ.ITERATOR
 * ...description...
 *
 * ## Fix guidance
 * ...
 * ```
 */

import { readdir, readFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';
import { CatalogLoadError } from '../core/errors.js';
import { SEVERITIES, type RuleDefinition } from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import type { RuleCatalogSource } from './rule_catalog.js';

const FrontMatterSchema = z
  .object({
    severity: z
      .string()
      .transform((value) => value.trim().toUpperCase())
      .pipe(z.enum(SEVERITIES))
      .default('MEDIUM'),
    title: z.string().optional(),
    // Validated per hint by the detector, so one bad entry only disables its rule.
    hints: z.array(z.unknown()).default([]),
  })
  .passthrough();

const FIX_GUIDANCE_HEADING = /^##\s+fix(?:ing)?\s+guidance\s*$/i;
const RULE_ID_PATTERN = /^[A-Za-z0-9_.-]+$/;

export interface ParsedRuleDocument {
  frontMatter: Record<string, unknown>;
  body: string;
}

/**
 * Split a Markdown document into its YAML front matter (if any) and body.
 */
export function splitFrontMatter(text: string): ParsedRuleDocument {
  const normalized = text.replace(/\r\n/g, '\n');
  const match = normalized.match(/^---\n([\s\S]*?)\n---\n?/);
  if (!match) {
    return { frontMatter: {}, body: normalized };
  }
  const parsed: unknown = yaml.parse(match[1]);
  const frontMatter = parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed) ? { ...parsed } : {};
  return { frontMatter, body: normalized.slice(match[0].length) };
}

/**
 * Turn one knowledge-base document into a RuleDefinition.
 */
export function parseRuleDocument(ruleId: string, text: string): RuleDefinition {
  const { frontMatter, body } = splitFrontMatter(text);
  const fields = FrontMatterSchema.safeParse(frontMatter);
  if (!fields.success) {
    const issue = fields.error.errors[0];
    throw new CatalogLoadError(
      `${ruleId}.md`,
      `invalid front matter${issue ? ` (${issue.path.join('.')}: ${issue.message})` : ''}`,
    );
  }

  const { description, fixGuidance } = splitBody(ruleId, body);
  return {
    id: ruleId,
    severity: fields.data.severity,
    title: fields.data.title,
    description,
    detectionHints: fields.data.hints,
    // Rules without a dedicated section hand the whole document to the engine.
    fixGuidance: fixGuidance || description,
  };
}

function splitBody(ruleId: string, body: string): { description: string; fixGuidance: string } {
  const lines = body.split('\n');
  const descriptionLines: string[] = [];
  const guidanceLines: string[] = [];
  let inGuidance = false;

  for (const line of lines) {
    if (FIX_GUIDANCE_HEADING.test(line.trim())) {
      inGuidance = true;
      continue;
    }
    if (inGuidance && /^##\s+/.test(line)) {
      inGuidance = false;
    }
    if (inGuidance) {
      guidanceLines.push(line);
    } else {
      descriptionLines.push(line);
    }
  }

  // Drop a leading `# RULE.ID` heading; it repeats the file name.
  const firstContent = descriptionLines.findIndex((line) => line.trim().length > 0);
  if (firstContent >= 0 && descriptionLines[firstContent].trim() === `# ${ruleId}`) {
    descriptionLines.splice(firstContent, 1);
  }

  return {
    description: descriptionLines.join('\n').trim(),
    fixGuidance: guidanceLines.join('\n').trim(),
  };
}

export class MarkdownRuleSource implements RuleCatalogSource {
  constructor(private readonly knowledgeBaseDir: string) {}

  get description(): string {
    return this.knowledgeBaseDir;
  }

  async loadAll(): Promise<RuleDefinition[]> {
    let entries: string[];
    try {
      entries = await readdir(this.knowledgeBaseDir);
    } catch (error) {
      throw new CatalogLoadError(this.knowledgeBaseDir, `cannot read directory: ${getErrorMessage(error)}`, toError(error));
    }

    const files = entries.filter((name) => extname(name).toLowerCase() === '.md').sort();
    const rules: RuleDefinition[] = [];
    for (const file of files) {
      const ruleId = basename(file, extname(file));
      if (!RULE_ID_PATTERN.test(ruleId)) {
        throw new CatalogLoadError(this.knowledgeBaseDir, `invalid rule file name ${file}`);
      }
      let text: string;
      try {
        text = await readFile(join(this.knowledgeBaseDir, file), 'utf8');
      } catch (error) {
        throw new CatalogLoadError(this.knowledgeBaseDir, `cannot read ${file}: ${getErrorMessage(error)}`, toError(error));
      }
      try {
        rules.push(parseRuleDocument(ruleId, text));
      } catch (error) {
        if (error instanceof CatalogLoadError) throw error;
        throw new CatalogLoadError(this.knowledgeBaseDir, `cannot parse ${file}: ${getErrorMessage(error)}`, toError(error));
      }
    }
    return rules;
  }
}
