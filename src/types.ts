export const CATEGORIES = ['skill', 'standards', 'reference'] as const;

export type Category = (typeof CATEGORIES)[number];

export type Severity = 'error' | 'warning';

export type OutputFormat = 'text' | 'json';

export type ExampleLabel = 'bad' | 'good';

export type Metadata = Readonly<Record<string, unknown>>;

export type FencedBlock = {
  info: string; // full info string after the opening fence
  lang?: string;
  label?: ExampleLabel;
  // labels of every comment line in the code, in order
  markers: ExampleLabel[];
  line: number; // 1-based line of the opening fence
  index: number; // document order across the whole file
  content: string;
  closed: boolean;
  nested?: SectionNode; // parsed tree for markdown fences
};

export type SectionNode = {
  title: string;
  level: number; // 0 = implicit root
  line: number;
  body: string;
  labels: string[]; // bold lead phrases, e.g. "**Problem:**"
  blocks: FencedBlock[];
  children: SectionNode[];
};

export type Section = {
  title: string;
  level: number;
  line: number;
  body: string;
};

type DocumentBase = {
  path: string;
  classifiedBy: 'inferred' | 'override';
  metadata: Metadata;
  sections: readonly Section[];
  root: SectionNode;
};

export type SkillDoc = DocumentBase & { category: 'skill' };
export type StandardsDoc = DocumentBase & { category: 'standards' };
export type ReferenceDoc = DocumentBase & { category: 'reference' };

export type Document = SkillDoc | StandardsDoc | ReferenceDoc;

export type SchemaRule = {
  id: string;
  appliesTo: Category;
  description: string;
  severity: Severity;
  predicate: (doc: Document) => boolean;
  // detail for the diagnostic message; falls back to `description`
  explain?: (doc: Document) => string;
};

export type Diagnostic = {
  documentPath: string;
  ruleId: string;
  severity: Severity;
  message: string;
};

export type DocumentStatus = 'passed' | 'failed' | 'skipped' | 'invalid';

export type DocumentOutcome = {
  path: string;
  category: Category | null;
  status: DocumentStatus;
  diagnostics: Diagnostic[];
  skipReason?: string;
};

export type RunSummary = {
  documents: number;
  errors: number;
  warnings: number;
  skipped: number;
  exitCode: number;
};

export type RunResult = {
  outcomes: DocumentOutcome[];
  summary: RunSummary;
  exitCode: number;
};

export type CLIOpts = {
  positional: string[]; // files or directories
  category?: Category;
  format?: OutputFormat;
  strict?: boolean;
  configPath?: string | null;
  reportPath?: string | null;
  outPath?: string | null;
  concurrency?: number;
  // list passing documents in the --out report too
  showPassed: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
};

export type CategoryOverride = {
  files: string; // glob, relative to the config file's directory
  category: Category;
};

export type LintConfig = {
  format: OutputFormat;
  strict: boolean;
  concurrency: number;
  ignore: string[];
  overrides: CategoryOverride[];
  // directory that override and ignore globs resolve against
  baseDir: string;
};

export type MarkdownReportOptions = {
  // list passed and skipped documents as well as failing ones
  showPassed?: boolean;
};
