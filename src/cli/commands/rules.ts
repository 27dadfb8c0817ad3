/**
 * @fileoverview rules command - list the rule catalog
 */

import { parseArgs } from 'node:util';
import { MarkdownRuleSource } from '../../catalog/markdown_source.js';
import { loadCatalog } from '../../catalog/rule_catalog.js';
import { loadRunConfig } from '../../config/run_config.js';
import { formatHint } from '../../detection/pattern_detector.js';
import type { RuleDefinition } from '../../types.js';
import { getErrorMessage } from '../../utils/errors.js';
import { createError } from '../errors.js';
import { printTable } from '../progress.js';
import type { CommandOptions } from './shared.js';

function parseRulesArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        workspace: { type: 'string', short: 'w' },
        config: { type: 'string', short: 'c' },
        kb: { type: 'string' },
        json: { type: 'boolean' },
      },
      allowPositionals: false,
      strict: true,
    });
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

export async function rulesCommand(options: CommandOptions): Promise<readonly RuleDefinition[]> {
  const { values } = parseRulesArgs(options.args);
  const config = await loadRunConfig({
    workspace: options.workspace,
    configPath: values.config,
    overrides: values.kb !== undefined ? { knowledgeBaseDir: values.kb } : {},
    env: options.env,
  });
  const catalog = await loadCatalog(new MarkdownRuleSource(config.knowledgeBaseDir));
  const rules = catalog.all();

  if (values.json) {
    console.log(JSON.stringify({ knowledgeBaseDir: config.knowledgeBaseDir, rules }, null, 2));
    return rules;
  }

  console.log(`Rule catalog: ${config.knowledgeBaseDir}\n`);
  printTable(
    ['Rule', 'Severity', 'Title', 'Hints'],
    rules.map((rule) => [rule.id, rule.severity, rule.title ?? '', rule.detectionHints.map(formatHint).join(', ')]),
  );
  console.log(`\n${rules.length} rule(s)`);
  return rules;
}
