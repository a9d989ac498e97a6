import fs from 'node:fs/promises';
import { IOError, ParseError } from './errors';
import { silentLogger, type Logger } from './logger';
import { parseDocument } from './parser';
import { defaultRegistry, type SchemaRegistry } from './registry';
import type { Category, CategoryOverride, DocumentOutcome } from './types';
import {
  color,
  expandGlobs,
  getTargets,
  ms,
  runPool,
  type Target,
} from './utils';
import { outcomeFor, parseFailure } from './validator';

export type LintOptions = {
  cwd: string;
  registry?: SchemaRegistry;
  // forces one category for every document
  category?: Category;
  overrides?: CategoryOverride[];
  ignore?: string[];
  // directory that `overrides` and `ignore` globs resolve against
  baseDir?: string;
  concurrency?: number;
  logger?: Logger;
};

type Source = Target & { text: string };

/**
 * Parse and validate one file's text. Parse failures become an `invalid`
 * outcome; nothing else is caught.
 */
export function lintSource(
  path: string,
  text: string,
  opts: { registry?: SchemaRegistry; category?: Category } = {}
): DocumentOutcome {
  try {
    const doc = parseDocument(path, text, { category: opts.category });
    return outcomeFor(doc, opts.registry ?? defaultRegistry);
  } catch (e) {
    if (e instanceof ParseError) return parseFailure(e);
    throw e;
  }
}

/** Last matching override wins. */
export async function resolveOverrides(
  overrides: CategoryOverride[],
  baseDir: string
): Promise<Map<string, Category>> {
  const byPath = new Map<string, Category>();
  for (const o of overrides) {
    for (const file of await expandGlobs([o.files], baseDir)) {
      byPath.set(file, o.category);
    }
  }
  return byPath;
}

async function readSources(targets: Target[], concurrency: number): Promise<Source[]> {
  return runPool(
    targets.map((t) => async (): Promise<Source> => {
      try {
        return { ...t, text: await fs.readFile(t.absolute, 'utf8') };
      } catch (e) {
        throw new IOError(t.path, 'cannot read file', { cause: e });
      }
    }),
    concurrency
  );
}

/**
 * Lint every documentation file under `inputs`. All files are read before
 * any is parsed, so an unreadable file fails the run (IOError) before a
 * single document model exists. After that, failures stay per document.
 */
export async function lintPaths(
  inputs: string[],
  opts: LintOptions
): Promise<DocumentOutcome[]> {
  const logger = opts.logger ?? silentLogger;
  const registry = opts.registry ?? defaultRegistry;
  const baseDir = opts.baseDir ?? opts.cwd;
  const concurrency = Math.max(1, opts.concurrency ?? 1);

  const ignored = await expandGlobs(opts.ignore ?? [], baseDir);
  const targets = await getTargets(inputs, { cwd: opts.cwd, ignored });
  const overrides = opts.category
    ? new Map<string, Category>()
    : await resolveOverrides(opts.overrides ?? [], baseDir);

  logger.debug(color.dim(`registry v${registry.version}, ${targets.length} document(s)`));
  const sources = await readSources(targets, concurrency);

  return runPool(
    sources.map((src) => async () => {
      const start = Date.now();
      const outcome = lintSource(src.path, src.text, {
        registry,
        category: opts.category ?? overrides.get(src.absolute),
      });
      logger.debug(
        `  ${color.bold('▶')} ${src.path}  ${statusLabel(outcome)}  ${color.gray(
          `(${ms(Date.now() - start)})`
        )}`
      );
      return outcome;
    }),
    concurrency
  );
}

function statusLabel(o: DocumentOutcome): string {
  switch (o.status) {
    case 'passed':
      return color.green('PASS');
    case 'failed':
      return color.red('FAIL');
    case 'invalid':
      return color.red('INVALID');
    case 'skipped':
      return color.yellow('SKIP');
  }
}
