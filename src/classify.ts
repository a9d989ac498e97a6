import { CATEGORIES, type Category, type Metadata, type Section } from './types';

// section titles that mark a document as defining a required format
const FORMAT_TITLE =
  /\b(?:format(?:ting)?\s+(?:requirements?|rules|specification)|required\s+format|output\s+format|finding\s+format)\b/i;

export function isFormatTitle(title: string): boolean {
  return FORMAT_TITLE.test(title);
}

/**
 * Infer a category from document shape. Explicit overrides bypass this
 * entirely; see `parseDocument`.
 */
export function classify(
  metadata: Metadata,
  sections: readonly Section[]
): Category {
  if ('name' in metadata && 'description' in metadata) return 'skill';
  if (sections.some((s) => isFormatTitle(s.title))) return 'standards';
  return 'reference';
}

export function isCategory(v: unknown): v is Category {
  return typeof v === 'string' && CATEGORIES.some((c) => c === v);
}

/** Accepts the long forms used in docs (`SkillDoc`, `standards-doc`). */
export function parseCategory(raw: string): Category | undefined {
  const key = raw
    .trim()
    .toLowerCase()
    .replace(/[-_ ]?doc$/, '');
  return isCategory(key) ? key : undefined;
}
