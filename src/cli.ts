import path from 'node:path';
import { loadConfig } from './config';
import { describeError, isInvocationError, UsageError } from './errors';
import { ConsoleLogger, type Logger, type Sink } from './logger';
import { lintPaths } from './pipeline';
import { defaultRegistry, type SchemaRegistry } from './registry';
import {
  aggregate,
  renderJson,
  renderMarkdownReport,
  renderText,
  writeReportFile,
} from './reporters';
import { parseCLI } from './utils';

export const VERSION = '0.1.0';

export const USAGE = `Usage: docs-lint [options] <path>...

Validate skill, standards and reference documents.
Directories are searched for *.md, *.markdown and *.mdx files.

Options:
  --category=<skill|standards|reference>  force the category of every document
  --format=<text|json>                    report shape on stdout (default: text)
  --strict                                fail on warnings as well as errors
  --config <file>                         config file (default: docs-lint.yml)
  --report <file>                         also write the JSON report to <file>
  --out <file>                            also write a Markdown report to <file>
  --show-passed                           list passing documents in the --out report
  --concurrency <n>                       documents processed at once
  -v, --verbose                           log each document to stderr
  -h, --help                              show this help
  --version                               print the version

Exit codes: 0 success, 1 failing documents, 2 invocation error.
`;

export type CliIO = {
  stdout: Sink;
  stderr: Sink;
  cwd: string;
  env: NodeJS.ProcessEnv;
};

export function processIO(): CliIO {
  return {
    stdout: (s) => process.stdout.write(s),
    stderr: (s) => process.stderr.write(s),
    cwd: process.cwd(),
    env: process.env,
  };
}

/**
 * Run one invocation and return its exit code. Invocation errors (bad
 * flags, bad paths, unreadable files, invalid config) print to stderr and
 * return 2; anything unexpected propagates.
 */
export async function run(
  argv: string[],
  io: CliIO = processIO(),
  registry: SchemaRegistry = defaultRegistry
): Promise<number> {
  let logger: Logger = new ConsoleLogger(false, io.stderr);
  try {
    const cli = parseCLI(argv);
    logger = new ConsoleLogger(cli.verbose, io.stderr);
    if (cli.help) {
      io.stdout(USAGE);
      return 0;
    }
    if (cli.version) {
      io.stdout(`${VERSION}\n`);
      return 0;
    }
    if (cli.positional.length === 0) {
      throw new UsageError('no paths given; see --help');
    }

    const config = loadConfig({ cwd: io.cwd, configPath: cli.configPath, env: io.env });
    const format = cli.format ?? config.format;
    const strict = cli.strict ?? config.strict;

    const outcomes = await lintPaths(cli.positional, {
      cwd: io.cwd,
      registry,
      category: cli.category,
      overrides: config.overrides,
      ignore: config.ignore,
      baseDir: config.baseDir,
      concurrency: cli.concurrency ?? config.concurrency,
      logger,
    });
    const result = aggregate(outcomes, { strict });

    io.stdout(format === 'json' ? renderJson(result) : renderText(result));

    if (cli.reportPath) {
      await writeReportFile(path.resolve(io.cwd, cli.reportPath), renderJson(result), logger);
    }
    if (cli.outPath) {
      await writeReportFile(
        path.resolve(io.cwd, cli.outPath),
        renderMarkdownReport(result, { showPassed: cli.showPassed }),
        logger
      );
    }
    return result.exitCode;
  } catch (e) {
    if (isInvocationError(e)) {
      logger.error(describeError(e));
      return 2;
    }
    throw e;
  }
}
