import fs from 'node:fs';
import path from 'node:path';
import * as yaml from 'yaml';
import { parseCategory } from './classify';
import { ConfigError, describeError, IOError, UsageError } from './errors';
import type { CategoryOverride, LintConfig, OutputFormat } from './types';

export const DEFAULT_CONCURRENCY = 16;

/**
 * Configuration file names searched in the working directory (in order)
 */
export const CONFIG_PATHS = [
  'docs-lint.yml',
  'docs-lint.yaml',
  '.docs-lint.yml',
  '.docs-lint.yaml',
];

type ConfigFile = Partial<Omit<LintConfig, 'baseDir'>>;

const KNOWN_KEYS = new Set(['format', 'strict', 'concurrency', 'ignore', 'overrides']);

/**
 * Defaults, with `DOCS_LINT_FORMAT` and `DOCS_LINT_CONCURRENCY` applied
 */
export function getDefaultConfig(
  baseDir: string,
  env: NodeJS.ProcessEnv = process.env
): LintConfig {
  return {
    format: envFormat(env.DOCS_LINT_FORMAT) ?? 'text',
    strict: false,
    concurrency: envConcurrency(env.DOCS_LINT_CONCURRENCY) ?? DEFAULT_CONCURRENCY,
    ignore: [],
    overrides: [],
    baseDir,
  };
}

function envFormat(raw: string | undefined): OutputFormat | undefined {
  if (!raw) return undefined;
  if (raw === 'text' || raw === 'json') return raw;
  throw new UsageError(`DOCS_LINT_FORMAT must be text or json, got "${raw}"`);
}

function envConcurrency(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new UsageError(`DOCS_LINT_CONCURRENCY must be a positive integer, got "${raw}"`);
  }
  return n;
}

export function findConfigFile(cwd: string): string | null {
  for (const name of CONFIG_PATHS) {
    const candidate = path.resolve(cwd, name);
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}

/**
 * Load configuration from `configPath`, or the first of CONFIG_PATHS found
 * in `cwd`, merged over the defaults. Globs in the file resolve against the
 * file's directory.
 */
export function loadConfig(
  opts: { cwd: string; configPath?: string | null; env?: NodeJS.ProcessEnv } = {
    cwd: process.cwd(),
  }
): LintConfig {
  const explicit = opts.configPath ? path.resolve(opts.cwd, opts.configPath) : null;
  const configPath = explicit ?? findConfigFile(opts.cwd);
  if (!configPath) return getDefaultConfig(opts.cwd, opts.env);

  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (e) {
    throw new IOError(configPath, 'cannot read config file', { cause: e });
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (e) {
    throw new ConfigError(configPath, [describeError(e)]);
  }

  const { value, problems } = readConfigFile(parsed);
  if (problems.length > 0) throw new ConfigError(configPath, problems);

  return mergeConfig(getDefaultConfig(path.dirname(configPath), opts.env), value);
}

/**
 * Validate raw YAML into a typed partial config, collecting every problem
 */
export function readConfigFile(raw: unknown): { value: ConfigFile; problems: string[] } {
  const problems: string[] = [];
  const value: ConfigFile = {};

  // an empty file parses to null
  if (raw === null || raw === undefined) return { value, problems };
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    return { value, problems: ['config must be a mapping'] };
  }

  for (const [key, v] of Object.entries(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      problems.push(`unknown key "${key}"`);
      continue;
    }
    switch (key) {
      case 'format':
        if (v === 'text' || v === 'json') value.format = v;
        else problems.push('format must be "text" or "json"');
        break;
      case 'strict':
        if (typeof v === 'boolean') value.strict = v;
        else problems.push('strict must be a boolean');
        break;
      case 'concurrency':
        if (typeof v === 'number' && Number.isInteger(v) && v >= 1) value.concurrency = v;
        else problems.push('concurrency must be a positive integer');
        break;
      case 'ignore':
        if (Array.isArray(v) && v.every((p): p is string => typeof p === 'string')) {
          value.ignore = v;
        } else problems.push('ignore must be a list of globs');
        break;
      case 'overrides':
        value.overrides = readOverrides(v, problems);
        break;
    }
  }
  return { value, problems };
}

function readOverrides(v: unknown, problems: string[]): CategoryOverride[] {
  if (!Array.isArray(v)) {
    problems.push('overrides must be a list of { files, category } entries');
    return [];
  }
  const out: CategoryOverride[] = [];
  v.forEach((entry: unknown, i) => {
    if (typeof entry !== 'object' || entry === null) {
      problems.push(`overrides[${i}] must be a mapping`);
      return;
    }
    const files: unknown = Reflect.get(entry, 'files');
    const category: unknown = Reflect.get(entry, 'category');
    const parsed = typeof category === 'string' ? parseCategory(category) : undefined;
    if (typeof files !== 'string' || !files) {
      problems.push(`overrides[${i}].files must be a glob`);
    } else if (!parsed) {
      problems.push(
        `overrides[${i}].category must be skill, standards or reference, got ${JSON.stringify(category)}`
      );
    } else {
      out.push({ files, category: parsed });
    }
  });
  return out;
}

/**
 * Merge a config file over defaults; later overrides win over earlier ones
 */
function mergeConfig(defaults: LintConfig, override: ConfigFile): LintConfig {
  return {
    format: override.format ?? defaults.format,
    strict: override.strict ?? defaults.strict,
    concurrency: override.concurrency ?? defaults.concurrency,
    ignore: override.ignore ?? defaults.ignore,
    overrides: override.overrides ?? defaults.overrides,
    baseDir: defaults.baseDir,
  };
}
