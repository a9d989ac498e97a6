import path from 'node:path';
import fs from 'node:fs/promises';
import fg from 'fast-glob';
import { parseCategory } from './classify';
import { IOError, UsageError } from './errors';
import type { CLIOpts, OutputFormat } from './types';

// ---------- Pretty logging ----------
export const color = {
  dim: (s: string) => `\x1b[2m${s}\x1b[0m`,
  gray: (s: string) => `\x1b[90m${s}\x1b[0m`,
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  green: (s: string) => `\x1b[32m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[0m`,
  bold: (s: string) => `\x1b[1m${s}\x1b[0m`,
};

export function ms(t: number) {
  return `${t} ms`;
}

// ---------- CLI ----------

const BOOLEAN_FLAGS = new Set([
  '--strict',
  '--show-passed',
  '--verbose',
  '-v',
  '--help',
  '-h',
  '--version',
]);

export function parseFormat(raw: string | undefined): OutputFormat | undefined {
  if (raw === undefined) return undefined;
  if (raw === 'text' || raw === 'json') return raw;
  throw new UsageError(`unknown format "${raw}"; expected text or json`);
}

export function parseConcurrency(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new UsageError(`concurrency must be a positive integer, got "${raw}"`);
  }
  return n;
}

/** Flags take `--flag value` or `--flag=value`; `--` ends flag parsing. */
export function parseCLI(argv: string[]): CLIOpts {
  const opts: CLIOpts = {
    positional: [],
    showPassed: false,
    verbose: false,
    help: false,
    version: false,
  };

  let flagsDone = false;
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (flagsDone || !a.startsWith('-') || a === '-') {
      opts.positional.push(a);
      continue;
    }
    if (a === '--') {
      flagsDone = true;
      continue;
    }

    const eq = a.indexOf('=');
    const flag = eq === -1 ? a : a.slice(0, eq);
    const inline = eq === -1 ? undefined : a.slice(eq + 1);
    if (BOOLEAN_FLAGS.has(flag) && inline !== undefined) {
      throw new UsageError(`${flag} does not take a value`);
    }
    const value = (): string => {
      const v = inline ?? argv[++i];
      if (v === undefined || v === '') {
        throw new UsageError(`${flag} needs a value`);
      }
      return v;
    };

    switch (flag) {
      case '--category': {
        const raw = value();
        const category = parseCategory(raw);
        if (!category) {
          throw new UsageError(
            `unknown category "${raw}"; expected skill, standards or reference`
          );
        }
        opts.category = category;
        break;
      }
      case '--format':
        opts.format = parseFormat(value());
        break;
      case '--strict':
        opts.strict = true;
        break;
      case '--config':
        opts.configPath = value();
        break;
      case '--report':
        opts.reportPath = value();
        break;
      case '--out':
        opts.outPath = value();
        break;
      case '--show-passed':
        opts.showPassed = true;
        break;
      case '--concurrency':
        opts.concurrency = parseConcurrency(value());
        break;
      case '--verbose':
      case '-v':
        opts.verbose = true;
        break;
      case '--help':
      case '-h':
        opts.help = true;
        break;
      case '--version':
        opts.version = true;
        break;
      default:
        throw new UsageError(`Unknown flag: ${a}`);
    }
  }
  return opts;
}

// ---------- Small, dependency-free promise pool ----------
export async function runPool<T>(
  tasks: Array<() => Promise<T>>,
  limit: number
): Promise<T[]> {
  const results: T[] = new Array<T>(tasks.length);
  let i = 0;

  async function worker() {
    while (true) {
      const idx = i++;
      if (idx >= tasks.length) break;
      results[idx] = await tasks[idx]();
    }
  }

  const workers = Array.from(
    { length: Math.max(1, Math.min(limit, tasks.length)) },
    () => worker()
  );
  await Promise.all(workers);
  return results;
}

// ---------- Targets ----------

export const DOC_PATTERN = '**/*.{md,markdown,mdx}';

export type Target = {
  path: string; // as reported: relative to cwd when inside it, posix separators
  absolute: string;
};

/** Byte-order comparison, independent of the host locale. */
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function displayPath(absolute: string, cwd: string): string {
  const rel = path.relative(cwd, absolute);
  const shown = rel && !rel.startsWith('..') && !path.isAbsolute(rel) ? rel : absolute;
  return shown.split(path.sep).join('/');
}

/**
 * Expand file and directory arguments into documentation files. Explicit
 * files are always kept; directory contents skip node_modules and anything
 * in `ignored`.
 */
export async function getTargets(
  inputs: string[],
  opts: { cwd: string; ignored?: ReadonlySet<string> }
): Promise<Target[]> {
  const found = new Set<string>();

  for (const input of inputs) {
    const absolute = path.resolve(opts.cwd, input);
    const stat = await fs.stat(absolute).catch((e: unknown) => {
      throw new IOError(input, 'no such file or directory', { cause: e });
    });

    if (stat.isDirectory()) {
      const files = await fg(DOC_PATTERN, {
        cwd: absolute,
        absolute: true,
        onlyFiles: true,
        dot: false,
        ignore: ['**/node_modules/**'],
      }).catch((e: unknown) => {
        throw new IOError(input, 'cannot read directory', { cause: e });
      });
      for (const f of files) {
        const resolved = path.resolve(f);
        if (!opts.ignored?.has(resolved)) found.add(resolved);
      }
    } else {
      found.add(absolute);
    }
  }

  return [...found]
    .map((absolute) => ({ absolute, path: displayPath(absolute, opts.cwd) }))
    .sort((a, b) => compareText(a.path, b.path));
}

/** Absolute paths matched by globs resolved against `baseDir`. */
export async function expandGlobs(
  patterns: string[],
  baseDir: string
): Promise<Set<string>> {
  if (patterns.length === 0) return new Set();
  const files = await fg(patterns, {
    cwd: baseDir,
    absolute: true,
    onlyFiles: true,
    dot: true,
  });
  return new Set(files.map((f) => path.resolve(f)));
}
