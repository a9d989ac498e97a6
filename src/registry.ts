import { referenceRules } from './rules/reference';
import { sharedRules } from './rules/shared';
import { skillRules } from './rules/skill';
import { standardsRules } from './rules/standards';
import type { Category, SchemaRule } from './types';

/** Bump whenever a rule is added, removed or changes meaning. */
export const REGISTRY_VERSION = 1;

export type RuleTable = Partial<Record<Category, readonly SchemaRule[]>>;

export interface SchemaRegistry {
  readonly version: number;
  categories(): Category[];
  has(category: string): boolean;
  // total: unknown categories yield an empty list
  rulesFor(category: string): readonly SchemaRule[];
}

export const RULE_TABLE: RuleTable = {
  skill: [...skillRules, ...sharedRules('skill')],
  standards: [...standardsRules, ...sharedRules('standards')],
  reference: [...referenceRules, ...sharedRules('reference')],
};

/**
 * Freeze a rule table into a registry. Throws on a rule filed under the
 * wrong category or a duplicate id, since either is a programming error.
 */
export function createRegistry(
  table: RuleTable,
  version = REGISTRY_VERSION
): SchemaRegistry {
  const byCategory = new Map<string, readonly SchemaRule[]>();

  for (const [category, rules] of Object.entries(table)) {
    if (!rules) continue;
    const seen = new Set<string>();
    for (const rule of rules) {
      if (rule.appliesTo !== category) {
        throw new Error(
          `rule ${rule.id} applies to ${rule.appliesTo} but is registered under ${category}`
        );
      }
      if (seen.has(rule.id)) {
        throw new Error(`duplicate rule id ${rule.id} for ${category}`);
      }
      seen.add(rule.id);
    }
    byCategory.set(category, Object.freeze(rules.map((r) => Object.freeze({ ...r }))));
  }

  const empty: readonly SchemaRule[] = Object.freeze([]);
  return Object.freeze({
    version,
    categories: () =>
      Object.keys(table).filter((c): c is Category => byCategory.has(c)),
    has: (category: string) => byCategory.has(category),
    rulesFor: (category: string) => byCategory.get(category) ?? empty,
  });
}

export const defaultRegistry = createRegistry(RULE_TABLE);
