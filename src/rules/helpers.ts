import { walkSections } from '../parser';
import type { Metadata, SectionNode } from '../types';

/** Lowercased heading/label text without numbering, emphasis or colon. */
export function normalizeName(s: string): string {
  return s
    .replace(/[*_`]/g, '')
    .replace(/^\s*\d+[.)]\s*/, '')
    .replace(/:\s*$/, '')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

/**
 * Heading titles and bold labels in a subtree, including the trees of
 * markdown fences inside it.
 */
export function namesIn(node: SectionNode): Set<string> {
  const names = new Set<string>();
  const collect = (tree: SectionNode) =>
    walkSections(tree, (n) => {
      if (n.level > 0) names.add(normalizeName(n.title));
      for (const label of n.labels) names.add(normalizeName(label));
      for (const b of n.blocks) if (b.nested) collect(b.nested);
    });
  collect(node);
  return names;
}

export function bodiesIn(node: SectionNode): string[] {
  const out: string[] = [];
  walkSections(node, (n) => out.push(n.body));
  return out;
}

export function nonEmptyString(metadata: Metadata, key: string): string | null {
  const v = metadata[key];
  return typeof v === 'string' && v.trim() ? v.trim() : null;
}
