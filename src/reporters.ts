// src/reporters.ts
import fs from 'node:fs/promises';
import path from 'node:path';
import { IOError } from './errors';
import type { Logger } from './logger';
import type {
  Diagnostic,
  DocumentOutcome,
  MarkdownReportOptions,
  RunResult,
  Severity,
} from './types';
import { compareText } from './utils';

const SEVERITY_RANK: Record<Severity, number> = { error: 0, warning: 1 };

function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return (
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
    compareText(a.ruleId, b.ruleId) ||
    compareText(a.message, b.message)
  );
}

/** Outcomes by path; diagnostics errors first, then rule id, then message. */
export function sortOutcomes(outcomes: readonly DocumentOutcome[]): DocumentOutcome[] {
  return outcomes
    .map((o) => ({ ...o, diagnostics: [...o.diagnostics].sort(compareDiagnostics) }))
    .sort((a, b) => compareText(a.path, b.path));
}

/**
 * Fold per-document outcomes into one run result. Completion order of the
 * workers does not matter: everything is re-sorted here.
 */
export function aggregate(
  outcomes: readonly DocumentOutcome[],
  opts: { strict?: boolean } = {}
): RunResult {
  const sorted = sortOutcomes(outcomes);
  const all = sorted.flatMap((o) => o.diagnostics);
  const errors = all.filter((d) => d.severity === 'error').length;
  const warnings = all.length - errors;
  const exitCode = errors > 0 || (opts.strict && warnings > 0) ? 1 : 0;

  return {
    outcomes: sorted,
    summary: {
      documents: sorted.length,
      errors,
      warnings,
      skipped: sorted.filter((o) => o.status === 'skipped').length,
      exitCode,
    },
    exitCode,
  };
}

/* ------------------------------- Text report ------------------------------- */

export function formatDiagnostic(d: Diagnostic): string {
  return `${d.severity} ${d.documentPath} [${d.ruleId}] ${d.message}`;
}

export function renderText(result: RunResult): string {
  const lines: string[] = [];
  for (const o of result.outcomes) {
    for (const d of o.diagnostics) lines.push(formatDiagnostic(d));
    if (o.status === 'skipped') {
      lines.push(`skipped ${o.path} (${o.skipReason ?? 'no applicable rules'})`);
    }
  }
  const { documents, errors, warnings } = result.summary;
  lines.push(`${documents} documents, ${errors} errors, ${warnings} warnings`);
  return lines.join('\n') + '\n';
}

/* ------------------------------- JSON report ------------------------------- */

/** Field names here are part of the output contract. */
export function toJsonReport(result: RunResult) {
  return {
    documents: result.outcomes.map((o) => ({
      path: o.path,
      category: o.category,
      status: o.status,
      ...(o.skipReason ? { skipReason: o.skipReason } : {}),
      diagnostics: o.diagnostics.map((d) => ({
        ruleId: d.ruleId,
        severity: d.severity,
        message: d.message,
      })),
    })),
    summary: { ...result.summary },
  };
}

export function renderJson(result: RunResult): string {
  return JSON.stringify(toJsonReport(result), null, 2) + '\n';
}

/* ----------------------------- Markdown report ----------------------------- */

function slugify(id: string) {
  return id
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/(^-|-$)/g, '');
}

const STATUS_ICON: Record<DocumentOutcome['status'], string> = {
  passed: '✅',
  failed: '❌',
  skipped: '⏭️',
  invalid: '💥',
};

export function renderMarkdownReport(
  result: RunResult,
  opts: MarkdownReportOptions = {}
): string {
  const { documents, errors, warnings, skipped, exitCode } = result.summary;
  const safe = (s: string) => s.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
  const listed = opts.showPassed
    ? result.outcomes
    : result.outcomes.filter((o) => o.diagnostics.length > 0 || o.status === 'skipped');

  // ---------- DASHBOARD ----------
  const dashboard = [
    `# 📄 Docs Lint Report`,
    ``,
    `| Documents | Errors | Warnings | Skipped |`,
    `| ---: | ---: | ---: | ---: |`,
    `| ${documents} | ${errors} | ${warnings} | ${skipped} |`,
    ``,
    `## 📊 Summary`,
    ``,
    `| Document | Status | Errors | Warnings | Rules |`,
    `|:---------|:------:|------:|------:|:------|`,
    ...listed.map((o) => {
      const errs = o.diagnostics.filter((d) => d.severity === 'error').length;
      const rules = [...new Set(o.diagnostics.map((d) => `\`${d.ruleId}\``))].join(', ') || '—';
      return `| [\`${o.path}\`](#doc-${slugify(o.path)}) | ${STATUS_ICON[o.status]} | ${errs} | ${
        o.diagnostics.length - errs
      } | ${rules} |`;
    }),
  ].join('\n');

  // ---------- DETAILS ----------
  const details = listed
    .map((o) => {
      const body = o.diagnostics.length
        ? o.diagnostics
            .map((d) => `- **${d.severity}** \`${d.ruleId}\`: ${safe(d.message)}`)
            .join('\n')
        : o.status === 'skipped'
          ? `_Skipped: ${o.skipReason ?? 'no applicable rules'}._`
          : `_No diagnostics._`;
      return [
        ``,
        `---`,
        ``,
        `### ${STATUS_ICON[o.status]} \`${o.path}\``,
        `<a id="doc-${slugify(o.path)}"></a>`,
        ``,
        `Category: ${o.category ?? 'unknown'}`,
        ``,
        body,
        ``,
        `[Back to summary](#-summary)`,
      ].join('\n');
    })
    .join('\n');

  const footer = [
    ``,
    `---`,
    exitCode === 0 ? '✅ **Result: PASS**' : '❌ **Result: FAIL**',
    '',
  ].join('\n');

  return [dashboard, details, footer].join('\n');
}

/* ------------------------------ Write to disk ------------------------------ */

export async function writeReportFile(
  file: string,
  content: string,
  logger: Logger
): Promise<void> {
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content, 'utf8');
  } catch (e) {
    throw new IOError(file, 'cannot write report', { cause: e });
  }
  logger.info(`📝 Wrote report to ${file}`);
}
