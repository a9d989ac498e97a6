import { walkSections } from '../parser';
import type { Document, SchemaRule, SectionNode } from '../types';
import { bodiesIn, namesIn } from './helpers';

// custom element tag in a heading: <sl-button>, `sl-button` or `<sl-button>`
const TAG_IN_TITLE = /<([a-z][a-z0-9]*-[a-z0-9-]*)>|`<?([a-z][a-z0-9]*-[a-z0-9-]*)>?`/;

const INTERACTIVE = new Set([
  'button',
  'icon-button',
  'copy-button',
  'input',
  'textarea',
  'select',
  'option',
  'checkbox',
  'radio',
  'radio-group',
  'radio-button',
  'switch',
  'range',
  'rating',
  'color-picker',
  'dialog',
  'drawer',
  'dropdown',
  'menu',
  'menu-item',
  'tab',
  'tab-group',
  'details',
  'tooltip',
  'tree',
  'tree-item',
  'carousel',
  'split-panel',
]);

const API_NAME = /\b(?:attributes?|propert(?:y|ies)|props|slots?|events?)\b/;
const API_TABLE_HEADER =
  /^\s*\|.*\b(?:attributes?|propert(?:y|ies)|props|slots?|events?)\b/im;

type Entry = { tag: string; node: SectionNode };

export function isInteractiveTag(tag: string): boolean {
  const rest = tag.slice(tag.indexOf('-') + 1);
  const last = tag.slice(tag.lastIndexOf('-') + 1);
  return INTERACTIVE.has(rest) || INTERACTIVE.has(last);
}

function interactiveEntries(doc: Document): Entry[] {
  const out: Entry[] = [];
  walkSections(doc.root, (node) => {
    if (node.level === 0) return;
    const m = TAG_IN_TITLE.exec(node.title);
    const tag = m ? m[1] ?? m[2] : undefined;
    if (tag && isInteractiveTag(tag)) out.push({ tag, node });
  });
  return out;
}

function declaresApi(node: SectionNode): boolean {
  for (const name of namesIn(node)) if (API_NAME.test(name)) return true;
  return bodiesIn(node).some((b) => API_TABLE_HEADER.test(b));
}

function undocumentedEntries(doc: Document): Entry[] {
  return interactiveEntries(doc).filter((e) => !declaresApi(e.node));
}

export const referenceRules: SchemaRule[] = [
  {
    id: 'reference/interactive-entry',
    appliesTo: 'reference',
    severity: 'error',
    description:
      'entries for interactive elements declare key attributes, slots or events',
    predicate: (doc) => undocumentedEntries(doc).length === 0,
    explain: (doc) =>
      `entry declares no attributes, slots or events: ${undocumentedEntries(doc)
        .map((e) => `<${e.tag}> (line ${e.node.line})`)
        .join(', ')}`,
  },
];
