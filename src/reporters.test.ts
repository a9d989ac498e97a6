import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import type { Logger } from './logger';
import {
  aggregate,
  renderJson,
  renderMarkdownReport,
  renderText,
  toJsonReport,
  writeReportFile,
} from './reporters';
import type { DocumentOutcome } from './types';

const outcomes: DocumentOutcome[] = [
  {
    path: 'b.md',
    category: 'reference',
    status: 'passed',
    diagnostics: [
      {
        documentPath: 'b.md',
        ruleId: 'structure/heading-increment',
        severity: 'warning',
        message: 'jump',
      },
    ],
  },
  {
    path: 'a.md',
    category: 'skill',
    status: 'failed',
    diagnostics: [
      { documentPath: 'a.md', ruleId: 'skill/name-format', severity: 'warning', message: 'bad name' },
      {
        documentPath: 'a.md',
        ruleId: 'skill/required-metadata',
        severity: 'error',
        message: 'missing',
      },
    ],
  },
  {
    path: 'c.md',
    category: 'reference',
    status: 'skipped',
    diagnostics: [],
    skipReason: 'no rules apply to category reference',
  },
];

describe('aggregate', () => {
  it('counts diagnostics and sorts outcomes by path', () => {
    const result = aggregate(outcomes);
    expect(result.outcomes.map((o) => o.path)).toEqual(['a.md', 'b.md', 'c.md']);
    expect(result.outcomes[0].diagnostics.map((d) => d.severity)).toEqual(['error', 'warning']);
    expect(result.summary).toEqual({
      documents: 3,
      errors: 1,
      warnings: 2,
      skipped: 1,
      exitCode: 1,
    });
  });

  it('does not depend on completion order', () => {
    expect(aggregate([...outcomes].reverse())).toEqual(aggregate(outcomes));
  });

  it('fails on warnings only under strict', () => {
    const warningsOnly = outcomes.slice(0, 1);
    expect(aggregate(warningsOnly).exitCode).toBe(0);
    expect(aggregate(warningsOnly, { strict: true }).exitCode).toBe(1);
  });

  it('succeeds on an empty run', () => {
    expect(aggregate([]).exitCode).toBe(0);
  });
});

describe('renderText', () => {
  it('prints one line per diagnostic and a summary', () => {
    expect(renderText(aggregate(outcomes))).toBe(
      'error a.md [skill/required-metadata] missing\n' +
        'warning a.md [skill/name-format] bad name\n' +
        'warning b.md [structure/heading-increment] jump\n' +
        'skipped c.md (no rules apply to category reference)\n' +
        '3 documents, 1 errors, 2 warnings\n'
    );
  });

  it('prints only the summary for an empty run', () => {
    expect(renderText(aggregate([]))).toBe('0 documents, 0 errors, 0 warnings\n');
  });
});

describe('renderJson', () => {
  it('groups diagnostics by document', () => {
    const report = toJsonReport(aggregate(outcomes));
    expect(report.documents[0]).toEqual({
      path: 'a.md',
      category: 'skill',
      status: 'failed',
      diagnostics: [
        { ruleId: 'skill/required-metadata', severity: 'error', message: 'missing' },
        { ruleId: 'skill/name-format', severity: 'warning', message: 'bad name' },
      ],
    });
    expect(report.documents[2]).toMatchObject({
      status: 'skipped',
      skipReason: 'no rules apply to category reference',
    });
    expect(report.summary.errors).toBe(1);
  });

  it('renders parseable JSON', () => {
    const text = renderJson(aggregate([]));
    expect(text.endsWith('\n')).toBe(true);
    expect(JSON.parse(text)).toEqual({
      documents: [],
      summary: { documents: 0, errors: 0, warnings: 0, skipped: 0, exitCode: 0 },
    });
  });
});

describe('renderMarkdownReport', () => {
  it('lists documents with diagnostics and the overall result', () => {
    const md = renderMarkdownReport(aggregate(outcomes));
    const lines = md.split('\n');

    expect(lines[0]).toBe('# 📄 Docs Lint Report');
    expect(lines).toContain('| 3 | 1 | 2 | 1 |');
    expect(lines).toContain(
      '| [`a.md`](#doc-a-md) | ❌ | 1 | 1 | `skill/required-metadata`, `skill/name-format` |'
    );
    expect(lines).toContain('- **error** `skill/required-metadata`: missing');
    expect(lines).toContain('_Skipped: no rules apply to category reference._');
    expect(lines).toContain('❌ **Result: FAIL**');
  });

  it('hides passed documents unless asked', () => {
    const passed: DocumentOutcome = {
      path: 'ok.md',
      category: 'skill',
      status: 'passed',
      diagnostics: [],
    };
    expect(renderMarkdownReport(aggregate([passed]))).not.toContain('`ok.md`');

    const md = renderMarkdownReport(aggregate([passed]), { showPassed: true });
    expect(md.split('\n')).toContain('| [`ok.md`](#doc-ok-md) | ✅ | 0 | 0 | — |');
    expect(md.split('\n')).toContain('✅ **Result: PASS**');
  });
});

describe('writeReportFile', () => {
  let dir = '';
  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates missing directories and logs the destination', async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docs-lint-report-'));
    const file = path.join(dir, 'nested', 'report.json');
    const info: string[] = [];
    const logger: Logger = {
      debug: () => undefined,
      info: (m) => info.push(m),
      error: () => undefined,
    };

    await writeReportFile(file, '{}\n', logger);

    expect(fs.readFileSync(file, 'utf8')).toBe('{}\n');
    expect(info).toEqual([`📝 Wrote report to ${file}`]);
  });
});
