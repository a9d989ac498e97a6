import { allTrees, blocksIn, walkSections } from '../parser';
import type {
  Category,
  Document,
  ExampleLabel,
  FencedBlock,
  SchemaRule,
} from '../types';

function labelsOf(block: FencedBlock): ExampleLabel[] {
  return block.label ? [block.label, ...block.markers] : block.markers;
}

// a fence holding `bad` then `good` comments pairs itself
function selfPaired(block: FencedBlock): boolean {
  const labels = labelsOf(block);
  return labels.lastIndexOf('good') > labels.lastIndexOf('bad');
}

function unpairedBadExamples(doc: Document): FencedBlock[] {
  const out: FencedBlock[] = [];
  for (const tree of allTrees(doc.root)) {
    walkSections(tree, (section) => {
      // scope ends at the next heading of equal or higher level,
      // i.e. it is this section plus its descendants
      const scope = blocksIn(section);
      for (const bad of section.blocks) {
        if (!labelsOf(bad).includes('bad') || selfPaired(bad)) continue;
        const paired = scope.some(
          (b) => b.index > bad.index && labelsOf(b).includes('good')
        );
        if (!paired) out.push(bad);
      }
    });
  }
  return out.sort((a, b) => a.index - b.index);
}

function unclosedFences(doc: Document): FencedBlock[] {
  const out: FencedBlock[] = [];
  for (const tree of allTrees(doc.root)) {
    walkSections(tree, (n) => {
      for (const b of n.blocks) if (!b.closed) out.push(b);
    });
  }
  return out.sort((a, b) => a.index - b.index);
}

type HeadingJump = { title: string; line: number; from: number; to: number };

function headingJumps(doc: Document): HeadingJump[] {
  const out: HeadingJump[] = [];
  walkSections(doc.root, (parent) => {
    if (parent.level === 0) return;
    for (const child of parent.children) {
      if (child.level > parent.level + 1) {
        out.push({
          title: child.title,
          line: child.line,
          from: parent.level,
          to: child.level,
        });
      }
    }
  });
  return out;
}

/** Rules every category carries, bound to `category`. */
export function sharedRules(category: Category): SchemaRule[] {
  return [
    {
      id: 'examples/bad-has-good',
      appliesTo: category,
      severity: 'error',
      description:
        'every "bad" example is followed by a "good" example before the next heading of equal or higher level',
      predicate: (doc) => unpairedBadExamples(doc).length === 0,
      explain: (doc) =>
        `"bad" example without a following "good" example: ${unpairedBadExamples(
          doc
        )
          .map((b) => `line ${b.line}`)
          .join(', ')}`,
    },
    {
      id: 'structure/closed-fences',
      appliesTo: category,
      severity: 'error',
      description: 'every code fence is closed',
      predicate: (doc) => unclosedFences(doc).length === 0,
      explain: (doc) =>
        `unclosed code fence opened at ${unclosedFences(doc)
          .map((b) => `line ${b.line}`)
          .join(', ')}`,
    },
    {
      id: 'structure/heading-increment',
      appliesTo: category,
      severity: 'warning',
      description: 'heading levels increase one at a time',
      predicate: (doc) => headingJumps(doc).length === 0,
      explain: (doc) =>
        headingJumps(doc)
          .map((j) => `heading "${j.title}" (line ${j.line}) jumps from h${j.from} to h${j.to}`)
          .join('; '),
    },
  ];
}
