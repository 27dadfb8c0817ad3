/**
 * @fileoverview Rule Catalog
 *
 * Read-only, indexed snapshot of the rule knowledge for one run. Catalog
 * order (the order the source returned the rules in) is the tie-breaker the
 * resolver uses between rules of equal severity.
 */

import { CatalogLoadError } from '../core/errors.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { severityRank, type RuleDefinition } from '../types.js';

export interface RuleCatalogSource {
  /** Human-readable origin used in error messages (a directory, a URL). */
  readonly description: string;
  loadAll(): Promise<RuleDefinition[]>;
}

export class RuleCatalog {
  private readonly byId: ReadonlyMap<string, RuleDefinition>;
  private readonly orderById: ReadonlyMap<string, number>;

  private constructor(private readonly rules: readonly RuleDefinition[]) {
    this.byId = new Map(rules.map((rule) => [rule.id, rule]));
    this.orderById = new Map(rules.map((rule, index) => [rule.id, index]));
  }

  /**
   * Build a catalog from already-loaded rules. Throws CatalogLoadError on
   * duplicate ids.
   */
  static fromRules(rules: readonly RuleDefinition[], origin = 'inline'): RuleCatalog {
    const seen = new Set<string>();
    for (const rule of rules) {
      if (seen.has(rule.id)) {
        throw new CatalogLoadError(origin, `duplicate rule id ${rule.id}`);
      }
      seen.add(rule.id);
    }
    return new RuleCatalog(rules.map((rule) => Object.freeze({ ...rule, detectionHints: Object.freeze([...rule.detectionHints]) })));
  }

  get size(): number {
    return this.rules.length;
  }

  all(): readonly RuleDefinition[] {
    return this.rules;
  }

  ids(): string[] {
    return this.rules.map((rule) => rule.id);
  }

  has(ruleId: string): boolean {
    return this.byId.has(ruleId);
  }

  get(ruleId: string): RuleDefinition | undefined {
    return this.byId.get(ruleId);
  }

  /** Position in catalog order; unknown ids sort last. */
  orderOf(ruleId: string): number {
    return this.orderById.get(ruleId) ?? Number.MAX_SAFE_INTEGER;
  }

  /**
   * Priority comparator: higher severity first, then catalog order.
   */
  compareRulePriority(a: string, b: string): number {
    const ruleA = this.byId.get(a);
    const ruleB = this.byId.get(b);
    const rankA = ruleA ? severityRank(ruleA.severity) : 0;
    const rankB = ruleB ? severityRank(ruleB.severity) : 0;
    if (rankA !== rankB) return rankB - rankA;
    return this.orderOf(a) - this.orderOf(b);
  }
}

/**
 * Load the whole catalog from a source. Any failure, and an empty catalog,
 * is a CatalogLoadError: the run cannot proceed without rules.
 */
export async function loadCatalog(source: RuleCatalogSource): Promise<RuleCatalog> {
  let rules: RuleDefinition[];
  try {
    rules = await source.loadAll();
  } catch (error) {
    if (error instanceof CatalogLoadError) throw error;
    throw new CatalogLoadError(source.description, getErrorMessage(error), toError(error));
  }
  if (rules.length === 0) {
    throw new CatalogLoadError(source.description, 'no rules found');
  }
  return RuleCatalog.fromRules(rules, source.description);
}
