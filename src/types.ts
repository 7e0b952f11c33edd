export type Severity = 'error' | 'warn';

export type RuleSetting = Severity | 'off';

export type ReportFormat = 'md' | 'html' | 'all' | 'none';

export type CLIOpts = {
  only?: string | null;
  config?: string | null;
  rulesDir?: string | null;
  reportPath?: string | null;
  model?: string | null;
  format?: ReportFormat;
  outBase?: string | null;
  showPassDetails?: boolean;
  quiet?: boolean;
  llm?: boolean;
  fileConcurrency?: number;
  ruleConcurrency?: number;
  noReport?: boolean;
  includeSource?: boolean;
  expandSource?: boolean;
  positional: string[]; // files
};

export type Violation = {
  ruleId: string;
  severity: Severity;
  message: string;
  line: number; // 1-based
  column: number; // 1-based
  suggestion?: string;
};

export type RuleResult = {
  id: string;
  pass: boolean;
  severity: Severity;
  rationale: string;
  suggested_fixes: string[];
  violations: Violation[];
};

export type FileResult = {
  file: string;
  overall_pass: boolean;
  rules: RuleResult[];
  source?: string;
};

export type RuleEngine = 'static' | 'llm';

export type RuleSpec = {
  id: string; // from front-matter or file name fallback
  severity: Severity;
  summary?: string;
  engine: RuleEngine;
  markdown: string; // full rule Markdown, guideline text plus bad/good examples
  filePath: string;
};

export type RuleLogOpts = {
  filePath?: string; // e.g., 'src/components/ReservationCard.jsx'
  showPassDetails?: boolean; // if true, show rationale/fixes even on PASS
  quiet?: boolean; // if true, PASS lines are not printed at all
  severity?: Severity; // severity given to a result built from a thrown error
};

export type Summary = {
  model: string | null; // null when no rule was judged by a model
  checked: number;
  passed: number;
  failed: number;
  errors: number;
  warnings: number;
  files: FileResult[];
};

export type SummaryRenderOptions = {
  showPassDetails?: boolean; // default false
};

export type PrettyReportOptions = {
  format?: ReportFormat;
  // file basename, extension will be added per format
  outBasePath?: string;
  // when true, include rationale/fixes for passed rules
  showPassDetails?: boolean;
  includeSource?: boolean;
  expandSource?: boolean;
};
