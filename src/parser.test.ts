import { describe, expect, it } from 'vitest';
import { ParseError } from './errors';
import { blocksIn, labelFromText, parseDocument } from './parser';

const lines = (...ls: string[]) => ls.join('\n');

describe('parseDocument', () => {
  it('splits front matter and nests sections by heading level', () => {
    const doc = parseDocument(
      'skill.md',
      lines(
        '---',
        'name: pdf-tools',
        'description: Work with PDFs',
        '---',
        'Intro text',
        '',
        '# Title',
        'Body one',
        '## Sub',
        'Sub body',
        '# Second',
        ''
      )
    );

    expect(doc.category).toBe('skill');
    expect(doc.classifiedBy).toBe('inferred');
    expect(doc.metadata).toEqual({ name: 'pdf-tools', description: 'Work with PDFs' });
    expect(doc.sections).toEqual([
      { title: '', level: 0, line: 5, body: 'Intro text' },
      { title: 'Title', level: 1, line: 7, body: 'Body one' },
      { title: 'Sub', level: 2, line: 9, body: 'Sub body' },
      { title: 'Second', level: 1, line: 11, body: '' },
    ]);
    expect(doc.root.children.map((c) => c.title)).toEqual(['Title', 'Second']);
    expect(doc.root.children[0].children[0].title).toBe('Sub');
  });

  it('rejects front matter that is never closed', () => {
    expect(() => parseDocument('a.md', lines('---', 'name: x', '# Title'))).toThrow(
      ParseError
    );
    expect(() => parseDocument('a.md', lines('---', 'name: x', '# Title'))).toThrow(
      'front matter opened on line 1 is never closed'
    );
  });

  it('rejects front matter that is not valid YAML', () => {
    expect(() =>
      parseDocument('a.md', lines('---', 'name: [unclosed', '---', 'body'))
    ).toThrow(/^invalid front matter: /);
  });

  it('does not report a missing description as a parse error', () => {
    const doc = parseDocument('a.md', lines('---', 'name: solo', '---', '# Solo'), {
      category: 'skill',
    });
    expect(doc.category).toBe('skill');
    expect(doc.metadata).toEqual({ name: 'solo' });
  });

  it('does not infer a skill from a description-only header', () => {
    const doc = parseDocument(
      'conventions.md',
      lines('---', 'description: TypeScript conventions', 'globs: "**/*.ts"', '---', '# Conventions')
    );
    expect(doc.category).toBe('reference');
    expect(doc.metadata).toEqual({
      description: 'TypeScript conventions',
      globs: '**/*.ts',
    });
  });

  it('collects every labelled comment inside a fence', () => {
    const doc = parseDocument(
      'a.md',
      lines('## Naming', '```ts', '// ❌ Bad', 'const d = 1;', '// ✅ Good', 'const days = 1;', '```')
    );
    const [block] = doc.root.children[0].blocks;
    expect(block.label).toBe('bad');
    expect(block.markers).toEqual(['bad', 'good']);
  });

  it('ignores headings inside code fences', () => {
    const doc = parseDocument('a.md', lines('# A', '```sh', '# comment', '```', '## B'));
    expect(doc.sections.map((s) => s.title)).toEqual(['', 'A', 'B']);

    const [block] = doc.root.children[0].blocks;
    expect(block).toMatchObject({
      lang: 'sh',
      content: '# comment',
      closed: true,
      line: 2,
      index: 0,
    });
    expect(block.label).toBeUndefined();
  });

  it('labels examples from the info string, the preceding line or a code comment', () => {
    const doc = parseDocument(
      'a.md',
      lines(
        '## Naming',
        '**Bad:**',
        '```ts',
        'let x = 1;',
        '```',
        '',
        '```ts good',
        'const x = 1;',
        '```',
        '```js',
        '// ❌ avoid var',
        'var y;',
        '```'
      )
    );
    const naming = doc.root.children[0];
    expect(naming.blocks.map((b) => b.label)).toEqual(['bad', 'good', 'bad']);
    expect(naming.labels).toEqual(['Bad']);
  });

  it('keeps an unclosed fence open to the end of the file', () => {
    const doc = parseDocument('a.md', lines('# A', '```ts', 'code', '## not a heading'));
    const [block] = doc.root.children[0].blocks;
    expect(block.closed).toBe(false);
    expect(block.content).toBe(lines('code', '## not a heading'));
    expect(doc.sections).toHaveLength(2);
  });

  it('parses markdown fences into nested section trees', () => {
    const doc = parseDocument(
      'a.md',
      lines('## Example', '````markdown', '### Problem', 'text', '```ts', 'x', '```', '````')
    );
    const [outer] = doc.root.children[0].blocks;
    expect(outer.closed).toBe(true);
    expect(outer.index).toBe(0);

    const problem = outer.nested?.children[0];
    expect(problem?.title).toBe('Problem');
    expect(problem?.line).toBe(3);
    expect(problem?.blocks.map((b) => [b.index, b.line])).toEqual([[1, 5]]);
  });

  it('normalizes CRLF and strips closing heading hashes', () => {
    const doc = parseDocument('a.md', 'a\r\n## Title ##\r\nc');
    expect(doc.sections.map((s) => [s.title, s.body])).toEqual([
      ['', 'a'],
      ['Title', 'c'],
    ]);
  });

  it('honors an explicit category over inference', () => {
    const doc = parseDocument('a.md', '## Formatting Requirements', {
      category: 'reference',
    });
    expect(doc.category).toBe('reference');
    expect(doc.classifiedBy).toBe('override');
  });

  it('is deterministic', () => {
    const text = lines('---', 'name: a', 'description: b', '---', '# A', '```ts bad', 'x', '```');
    expect(parseDocument('a.md', text)).toEqual(parseDocument('a.md', text));
  });
});

describe('blocksIn', () => {
  it('returns blocks of a subtree in document order', () => {
    const doc = parseDocument(
      'a.md',
      lines('# A', '```ts', '1', '```', '## B', '```ts', '2', '```', '# C', '```ts', '3', '```')
    );
    expect(blocksIn(doc.root.children[0]).map((b) => b.content)).toEqual(['1', '2']);
    expect(blocksIn(doc.root).map((b) => b.content)).toEqual(['1', '2', '3']);
  });
});

describe('labelFromText', () => {
  it.each<[string, string | undefined]>([
    ['Prefer this:', 'good'],
    ["Don't do this", 'bad'],
    ['✅ Good', 'good'],
    ['> **Incorrect**', 'bad'],
    ['Badge component', undefined],
    ['Some prose', undefined],
  ])('%s -> %s', (text, expected) => {
    expect(labelFromText(text)).toBe(expected);
  });
});
