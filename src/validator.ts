import { describeError, ParseError, RuleEvaluationError, UnknownCategoryError } from './errors';
import type { SchemaRegistry } from './registry';
import type {
  Diagnostic,
  Document,
  DocumentOutcome,
  SchemaRule,
} from './types';

export const PARSE_ERROR_ID = 'parse-error';
export const UNKNOWN_CATEGORY_ID = 'unknown-category';

function ruleDiagnostic(doc: Document, rule: SchemaRule): Diagnostic {
  let message = rule.description;
  if (rule.explain) {
    try {
      message = rule.explain(doc);
    } catch (e) {
      message = `${rule.description} (message unavailable: ${describeError(e)})`;
    }
  }
  return {
    documentPath: doc.path,
    ruleId: rule.id,
    severity: rule.severity,
    message,
  };
}

/**
 * Evaluate every rule registered for the document's category, in
 * registration order. Rules are independent: a throwing predicate becomes
 * one error diagnostic blamed on that rule and evaluation carries on.
 */
export function validate(doc: Document, registry: SchemaRegistry): Diagnostic[] {
  if (!registry.has(doc.category)) {
    const err = new UnknownCategoryError(doc.path, doc.category);
    return [
      {
        documentPath: doc.path,
        ruleId: UNKNOWN_CATEGORY_ID,
        severity: 'warning',
        message: `${err.message}; document skipped`,
      },
    ];
  }

  const diagnostics: Diagnostic[] = [];
  for (const rule of registry.rulesFor(doc.category)) {
    if (rule.appliesTo !== doc.category) continue;
    let ok: boolean;
    try {
      ok = rule.predicate(doc);
    } catch (e) {
      const err = new RuleEvaluationError(rule.id, doc.path, { cause: e });
      diagnostics.push({
        documentPath: doc.path,
        ruleId: rule.id,
        severity: 'error',
        message: err.message,
      });
      continue;
    }
    if (!ok) diagnostics.push(ruleDiagnostic(doc, rule));
  }
  return diagnostics;
}

/** Validate and wrap into a reportable outcome. */
export function outcomeFor(doc: Document, registry: SchemaRegistry): DocumentOutcome {
  const diagnostics = validate(doc, registry);

  if (!registry.has(doc.category)) {
    return {
      path: doc.path,
      category: doc.category,
      status: 'skipped',
      diagnostics,
      skipReason: `no schema for category ${doc.category}`,
    };
  }
  if (registry.rulesFor(doc.category).length === 0) {
    return {
      path: doc.path,
      category: doc.category,
      status: 'skipped',
      diagnostics,
      skipReason: `no rules apply to category ${doc.category}`,
    };
  }
  return {
    path: doc.path,
    category: doc.category,
    status: diagnostics.some((d) => d.severity === 'error') ? 'failed' : 'passed',
    diagnostics,
  };
}

export function parseFailure(err: ParseError): DocumentOutcome {
  return {
    path: err.path,
    category: null,
    status: 'invalid',
    diagnostics: [
      {
        documentPath: err.path,
        ruleId: PARSE_ERROR_ID,
        severity: 'error',
        message: err.message,
      },
    ],
  };
}
