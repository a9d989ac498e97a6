import matter from 'gray-matter';
import { classify } from './classify';
import { describeError, ParseError } from './errors';
import type {
  Category,
  Document,
  ExampleLabel,
  FencedBlock,
  Metadata,
  Section,
  SectionNode,
} from './types';

export type ParseOptions = {
  // skips classification when set
  category?: Category;
};

const HEADING = /^ {0,3}(#{1,6})(?:[ \t]+(.*?))?[ \t]*$/;
const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})(.*)$/;
const FENCE_CLOSE = /^ {0,3}(`{3,}|~{3,})[ \t]*$/;
const BOLD_LEAD = /^\s*(?:[-*+]\s+|\d+[.)]\s+)?(?:\*\*|__)(.+?)(?:\*\*|__)/;
const CODE_COMMENT = /^\s*(?:\/\/|#|\/\*|<!--|--)\s*(.*)$/;
const LABEL_WORD =
  /^(don't|do not|bad|avoid|incorrect|wrong|good|preferred|prefer|correct|better)\b/i;

const MARKDOWN_LANGS = new Set(['md', 'markdown']);
const MAX_NESTING = 4;

type ParseContext = {
  nextIndex: number;
  depth: number;
};

type Builder = {
  node: SectionNode;
  body: string[];
};

/**
 * Parse one file into a Document. Pure: the same path and text always give
 * the same Document.
 *
 * Throws ParseError when the front matter is unclosed, is not valid YAML or
 * is not a mapping.
 */
export function parseDocument(
  path: string,
  text: string,
  opts: ParseOptions = {}
): Document {
  const normalized = text.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
  const { metadata, lines, startLine } = splitFrontMatter(path, normalized);

  const root = parseTree(lines, startLine, { nextIndex: 0, depth: 0 });
  const sections = flattenSections(root);

  const category = opts.category ?? classify(metadata, sections);
  return {
    path,
    category,
    classifiedBy: opts.category ? 'override' : 'inferred',
    metadata,
    sections,
    root,
  };
}

function splitFrontMatter(
  path: string,
  text: string
): { metadata: Metadata; lines: string[]; startLine: number } {
  const lines = text.split('\n');
  if (lines[0] !== '---') {
    return { metadata: Object.freeze({}), lines, startLine: 1 };
  }

  const close = lines.indexOf('---', 1);
  if (close === -1) {
    throw new ParseError(path, 'front matter opened on line 1 is never closed');
  }

  let data: unknown;
  try {
    // passing options bypasses gray-matter's shared content cache
    data = matter(text, {}).data;
  } catch (e) {
    throw new ParseError(path, `invalid front matter: ${describeError(e)}`, {
      cause: e,
    });
  }
  if (!isRecord(data)) {
    throw new ParseError(path, 'front matter must be a key/value mapping');
  }

  return {
    metadata: Object.freeze({ ...data }),
    lines: lines.slice(close + 1),
    startLine: close + 2,
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function newNode(title: string, level: number, line: number): SectionNode {
  return { title, level, line, body: '', labels: [], blocks: [], children: [] };
}

function parseTree(
  lines: string[],
  startLine: number,
  ctx: ParseContext
): SectionNode {
  const root: Builder = { node: newNode('', 0, startLine), body: [] };
  const builders: Builder[] = [root];
  const stack: Builder[] = [root];
  let current = root;
  // previous non-blank text line in the current section
  let lastText: string | null = null;

  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    const lineNo = startLine + i;

    const fence = FENCE_OPEN.exec(line);
    if (fence && !(fence[1].startsWith('`') && fence[2].includes('`'))) {
      const marker = fence[1];
      const content: string[] = [];
      let j = i + 1;
      let closed = false;
      for (; j < lines.length; j++) {
        const m = FENCE_CLOSE.exec(lines[j]);
        if (m && m[1][0] === marker[0] && m[1].length >= marker.length) {
          closed = true;
          break;
        }
        content.push(lines[j]);
      }
      const end = closed ? j : lines.length - 1;
      current.body.push(...lines.slice(i, end + 1));
      current.node.blocks.push(
        buildBlock(fence[2].trim(), content, lineNo, closed, lastText, ctx)
      );
      lastText = null;
      i = end + 1;
      continue;
    }

    const heading = HEADING.exec(line);
    if (heading) {
      const level = heading[1].length;
      const title = (heading[2] ?? '').replace(/(?:^|[ \t]+)#+$/, '').trim();
      while (stack.length > 1 && current.node.level >= level) {
        stack.pop();
        current = stack[stack.length - 1];
      }
      const next: Builder = { node: newNode(title, level, lineNo), body: [] };
      current.node.children.push(next.node);
      builders.push(next);
      stack.push(next);
      current = next;
      lastText = null;
      i++;
      continue;
    }

    current.body.push(line);
    if (line.trim()) {
      lastText = line;
      const lead = BOLD_LEAD.exec(line);
      if (lead) {
        current.node.labels.push(lead[1].replace(/:\s*$/, '').trim());
      }
    }
    i++;
  }

  for (const b of builders) b.node.body = trimBlankLines(b.body).join('\n');
  return root.node;
}

function buildBlock(
  info: string,
  content: string[],
  line: number,
  closed: boolean,
  precedingText: string | null,
  ctx: ParseContext
): FencedBlock {
  const [lang, ...rest] = info.split(/\s+/).filter(Boolean);
  const isMarkdown = lang !== undefined && MARKDOWN_LANGS.has(lang.toLowerCase());

  const markers = isMarkdown ? [] : commentMarkers(content);

  const block: FencedBlock = {
    info,
    lang,
    label: detectLabel(rest, precedingText) ?? markers[0],
    markers,
    line,
    index: ctx.nextIndex++,
    content: content.join('\n'),
    closed,
  };

  if (isMarkdown && ctx.depth < MAX_NESTING) {
    // numbering stays global so indices are unique per document
    const inner: ParseContext = { nextIndex: ctx.nextIndex, depth: ctx.depth + 1 };
    block.nested = parseTree(content, line + 1, inner);
    ctx.nextIndex = inner.nextIndex;
  }
  return block;
}

/**
 * Label precedence: info string tokens, then the text line right before the
 * fence, then the first labelled comment in the code.
 */
function detectLabel(
  infoTokens: string[],
  precedingText: string | null
): ExampleLabel | undefined {
  for (const token of infoTokens) {
    const word = token.replace(/^[\w-]+=/, '').replace(/["'{}]/g, '');
    const label = labelFromText(word);
    if (label) return label;
  }
  if (precedingText) return labelFromText(precedingText);
  return undefined;
}

/** `// ❌ Bad` ... `// ✅ Good` inside one fence gives ['bad', 'good']. */
function commentMarkers(content: string[]): ExampleLabel[] {
  const out: ExampleLabel[] = [];
  for (const line of content) {
    const comment = CODE_COMMENT.exec(line);
    const label = comment ? labelFromText(comment[1]) : undefined;
    if (label) out.push(label);
  }
  return out;
}

export function labelFromText(text: string): ExampleLabel | undefined {
  const s = text.replace(/^[\s>*_#`+-]+/, '');
  if (s.startsWith('❌') || s.startsWith('🚫')) return 'bad';
  if (s.startsWith('✅') || s.startsWith('✔')) return 'good';

  const m = LABEL_WORD.exec(s);
  if (!m) return undefined;
  switch (m[1].toLowerCase()) {
    case "don't":
    case 'do not':
    case 'bad':
    case 'avoid':
    case 'incorrect':
    case 'wrong':
      return 'bad';
    default:
      return 'good';
  }
}

function trimBlankLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && !lines[start].trim()) start++;
  while (end > start && !lines[end - 1].trim()) end--;
  return lines.slice(start, end);
}

function flattenSections(root: SectionNode): Section[] {
  const out: Section[] = [];
  const visit = (node: SectionNode) => {
    out.push({
      title: node.title,
      level: node.level,
      line: node.line,
      body: node.body,
    });
    node.children.forEach(visit);
  };
  visit(root);
  return out;
}

/** Pre-order walk over a section tree, not descending into nested fences. */
export function walkSections(
  node: SectionNode,
  fn: (node: SectionNode) => void
): void {
  fn(node);
  for (const child of node.children) walkSections(child, fn);
}

/** Fenced blocks of a subtree in document order. */
export function blocksIn(node: SectionNode): FencedBlock[] {
  const out: FencedBlock[] = [];
  walkSections(node, (n) => out.push(...n.blocks));
  return out.sort((a, b) => a.index - b.index);
}

/** The root tree plus every nested markdown tree, each as its own scope. */
export function allTrees(root: SectionNode): SectionNode[] {
  const out: SectionNode[] = [];
  const collect = (tree: SectionNode) => {
    out.push(tree);
    walkSections(tree, (n) => {
      for (const b of n.blocks) if (b.nested) collect(b.nested);
    });
  };
  collect(root);
  return out;
}
