import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONCURRENCY, getDefaultConfig, loadConfig, readConfigFile } from './config';
import { ConfigError, IOError, UsageError } from './errors';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docs-lint-config-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('getDefaultConfig', () => {
  it('uses built-in defaults with an empty environment', () => {
    expect(getDefaultConfig(dir, {})).toEqual({
      format: 'text',
      strict: false,
      concurrency: DEFAULT_CONCURRENCY,
      ignore: [],
      overrides: [],
      baseDir: dir,
    });
  });

  it('reads format and concurrency from the environment', () => {
    const config = getDefaultConfig(dir, {
      DOCS_LINT_FORMAT: 'json',
      DOCS_LINT_CONCURRENCY: '4',
    });
    expect(config.format).toBe('json');
    expect(config.concurrency).toBe(4);
  });

  it('rejects invalid environment values', () => {
    expect(() => getDefaultConfig(dir, { DOCS_LINT_FORMAT: 'xml' })).toThrow(UsageError);
    expect(() => getDefaultConfig(dir, { DOCS_LINT_CONCURRENCY: '0' })).toThrow(
      'DOCS_LINT_CONCURRENCY must be a positive integer, got "0"'
    );
  });
});

describe('loadConfig', () => {
  it('returns defaults when no config file exists', () => {
    expect(loadConfig({ cwd: dir, env: {} })).toEqual(getDefaultConfig(dir, {}));
  });

  it('finds docs-lint.yml and resolves globs against its directory', () => {
    fs.writeFileSync(
      path.join(dir, 'docs-lint.yml'),
      [
        'format: json',
        'strict: true',
        'ignore:',
        '  - drafts/**',
        'overrides:',
        '  - files: standards/*.md',
        '    category: standards',
      ].join('\n')
    );

    expect(loadConfig({ cwd: dir, env: { DOCS_LINT_CONCURRENCY: '2' } })).toEqual({
      format: 'json',
      strict: true,
      concurrency: 2,
      ignore: ['drafts/**'],
      overrides: [{ files: 'standards/*.md', category: 'standards' }],
      baseDir: dir,
    });
  });

  it('takes an explicit path relative to the working directory', () => {
    fs.mkdirSync(path.join(dir, 'conf'));
    fs.writeFileSync(path.join(dir, 'conf', 'lint.yaml'), 'concurrency: 3\n');

    const config = loadConfig({ cwd: dir, configPath: 'conf/lint.yaml', env: {} });
    expect(config.concurrency).toBe(3);
    expect(config.baseDir).toBe(path.join(dir, 'conf'));
  });

  it('treats an empty file as no settings', () => {
    fs.writeFileSync(path.join(dir, '.docs-lint.yml'), '');
    expect(loadConfig({ cwd: dir, env: {} }).format).toBe('text');
  });

  it('reports every problem in the file', () => {
    const file = path.join(dir, 'docs-lint.yml');
    fs.writeFileSync(file, 'format: xml\nbogus: 1\n');

    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(
      `invalid config at ${file}: format must be "text" or "json"; unknown key "bogus"`
    );
  });

  it('rejects YAML it cannot parse', () => {
    fs.writeFileSync(path.join(dir, 'docs-lint.yml'), 'ignore: [unclosed\n');
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(ConfigError);
  });

  it('fails when an explicit config file is missing', () => {
    expect(() => loadConfig({ cwd: dir, configPath: 'missing.yml', env: {} })).toThrow(IOError);
  });
});

describe('readConfigFile', () => {
  it('accepts null as an empty config', () => {
    expect(readConfigFile(null)).toEqual({ value: {}, problems: [] });
  });

  it('rejects a list at the top level', () => {
    expect(readConfigFile(['format']).problems).toEqual(['config must be a mapping']);
  });

  it('validates field types', () => {
    expect(
      readConfigFile({ strict: 'yes', concurrency: 1.5, ignore: [1] }).problems
    ).toEqual([
      'strict must be a boolean',
      'concurrency must be a positive integer',
      'ignore must be a list of globs',
    ]);
  });

  it('validates override entries', () => {
    const { value, problems } = readConfigFile({
      overrides: [
        { files: 'a/*.md', category: 'changelog' },
        { category: 'skill' },
        { files: 'skills/**', category: 'skill-doc' },
      ],
    });
    expect(problems).toEqual([
      'overrides[0].category must be skill, standards or reference, got "changelog"',
      'overrides[1].files must be a glob',
    ]);
    expect(value.overrides).toEqual([{ files: 'skills/**', category: 'skill' }]);
  });
});
