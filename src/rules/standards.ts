import { isFormatTitle } from '../classify';
import { walkSections } from '../parser';
import type { Document, SchemaRule, SectionNode } from '../types';
import { bodiesIn, namesIn, normalizeName } from './helpers';

export const FINDING_SUBSECTIONS = [
  'Current Code',
  'Problem',
  'Impact',
  'Suggested Fix',
  'Why This Fix Works',
  'Validation',
] as const;

const MENTIONS_FINDINGS = /\bfindings?\b/i;

function formatSection(doc: Document): SectionNode | null {
  let found: SectionNode | null = null;
  walkSections(doc.root, (n) => {
    if (!found && n.level > 0 && isFormatTitle(n.title)) found = n;
  });
  return found;
}

function describesFindings(doc: Document): boolean {
  return (
    doc.sections.some((s) => MENTIONS_FINDINGS.test(s.title)) ||
    bodiesIn(doc.root).some((b) => MENTIONS_FINDINGS.test(b))
  );
}

/** Required subsections absent from the finding example. */
export function missingSubsections(doc: Document): string[] {
  if (!describesFindings(doc)) return [];
  const names = namesIn(formatSection(doc) ?? doc.root);
  return FINDING_SUBSECTIONS.filter((s) => !names.has(normalizeName(s)));
}

export const standardsRules: SchemaRule[] = [
  {
    id: 'standards/format-section',
    appliesTo: 'standards',
    severity: 'warning',
    description: 'declares a formatting requirements section',
    predicate: (doc) => formatSection(doc) !== null,
    explain: () =>
      'no section titled with formatting requirements (e.g. "Formatting Requirements")',
  },
  {
    id: 'standards/finding-subsections',
    appliesTo: 'standards',
    severity: 'error',
    description: `the example finding enumerates ${FINDING_SUBSECTIONS.join(', ')}`,
    predicate: (doc) => missingSubsections(doc).length === 0,
    explain: (doc) =>
      `example finding is missing required subsection(s): ${missingSubsections(
        doc
      ).join(', ')}`,
  },
];
