/**
 * Error taxonomy. Per-document failures (`ParseError`, `RuleEvaluationError`,
 * `UnknownCategoryError`) become diagnostics; the rest abort the run with
 * exit code 2.
 */
export class DocsLintError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed document structure; fatal only for that document. */
export class ParseError extends DocsLintError {
  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class UnknownCategoryError extends DocsLintError {
  constructor(
    readonly path: string,
    readonly category: string
  ) {
    super(`no schema registered for category "${category}"`);
  }
}

export class RuleEvaluationError extends DocsLintError {
  constructor(
    readonly ruleId: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`rule ${ruleId} failed to evaluate: ${describeError(options?.cause)}`, options);
  }
}

/** A path that does not exist or cannot be read. */
export class IOError extends DocsLintError {
  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${path}: ${message}`, options);
  }
}

export class UsageError extends DocsLintError {}

export class ConfigError extends DocsLintError {
  constructor(
    readonly configPath: string,
    readonly problems: string[]
  ) {
    super(`invalid config at ${configPath}: ${problems.join('; ')}`);
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/** Exit code 2 covers everything that stops a run before a report exists. */
export function isInvocationError(e: unknown): boolean {
  return (
    e instanceof IOError || e instanceof UsageError || e instanceof ConfigError
  );
}
