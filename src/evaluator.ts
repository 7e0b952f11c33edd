// src/evaluator.ts
import { errorMessage } from './errors';
import type { RuleRegistry } from './registry';
import type { RuleFinding, StyleRule } from './rules';
import { lineAndColumn, scanSource, type ScannedSource } from './scanner';
import type {
  FileResult,
  RuleResult,
  RuleSetting,
  RuleSpec,
  Severity,
  Violation,
} from './types';

const DIRECTIVE =
  /(?:\/\/|\/\*)\s*react-style-disable(-next-line|-line)?(?![\w-])(.*)$/;

/** null means "every rule". */
type RuleSet = Set<string> | null;

export type Suppressions = {
  file: RuleSet | undefined;
  lines: Map<number, RuleSet>;
};

function parseIds(rest: string): RuleSet {
  const ids = rest
    .replace(/\*\/.*$/, '')
    .split(/[\s,]+/)
    .filter(Boolean);
  return ids.length ? new Set(ids) : null;
}

function mergeSets(a: RuleSet | undefined, b: RuleSet): RuleSet {
  if (a === undefined) return b;
  if (a === null || b === null) return null;
  return new Set([...a, ...b]);
}

/**
 * Read inline directives:
 * - `react-style-disable [ids]` for the whole file
 * - `react-style-disable-line [ids]` for the same line
 * - `react-style-disable-next-line [ids]` for the following line
 */
export function parseSuppressions(lines: string[]): Suppressions {
  const out: Suppressions = { file: undefined, lines: new Map() };
  lines.forEach((text, i) => {
    const m = DIRECTIVE.exec(text);
    if (!m) return;
    const ids = parseIds(m[2] ?? '');
    if (m[1] === undefined) {
      out.file = mergeSets(out.file, ids);
      return;
    }
    const line = m[1] === '-line' ? i + 1 : i + 2;
    out.lines.set(line, mergeSets(out.lines.get(line), ids));
  });
  return out;
}

export function isSuppressed(s: Suppressions, ruleId: string, line: number) {
  const covers = (set: RuleSet | undefined) =>
    set !== undefined && (set === null || set.has(ruleId));
  return covers(s.file) || covers(s.lines.get(line));
}

export type PreparedSource = {
  source: ScannedSource;
  suppressions: Suppressions;
};

export function prepareSource(text: string, file: string): PreparedSource {
  const source = scanSource(text, file);
  return { source, suppressions: parseSuppressions(source.lines) };
}

export function resolveSeverity(
  id: string,
  fallback: Severity,
  settings: Record<string, RuleSetting> = {},
  docs?: Map<string, RuleSpec>
): RuleSetting {
  return settings[id] ?? docs?.get(id)?.severity ?? fallback;
}

function toViolation(
  source: ScannedSource,
  ruleId: string,
  severity: Severity,
  finding: RuleFinding
): Violation {
  const pos = finding.node ? finding.node.getStart(source.sourceFile) : finding.pos ?? 0;
  const { line, column } = lineAndColumn(source, pos);
  const v: Violation = { ruleId, severity, message: finding.message, line, column };
  if (finding.suggestion) v.suggestion = finding.suggestion;
  return v;
}

export function toRuleResult(
  id: string,
  severity: Severity,
  violations: Violation[]
): RuleResult {
  const fixes = [
    ...new Set(violations.flatMap((v) => (v.suggestion ? [v.suggestion] : []))),
  ];
  return {
    id,
    pass: violations.length === 0,
    severity,
    rationale: violations.map((v) => `${v.line}:${v.column} ${v.message}`).join('; '),
    suggested_fixes: fixes,
    violations,
  };
}

/** Apply one rule to a prepared source; a throwing rule becomes a failed result. */
export function evaluateRule(
  rule: StyleRule,
  prepared: PreparedSource,
  severity: Severity
): RuleResult {
  let findings: RuleFinding[];
  try {
    findings = rule.check(prepared.source);
  } catch (e) {
    return {
      id: rule.id,
      pass: false,
      severity,
      rationale: `Rule crashed: ${errorMessage(e)}`,
      suggested_fixes: [],
      violations: [],
    };
  }
  const violations = findings
    .map((f) => toViolation(prepared.source, rule.id, severity, f))
    .filter((v) => !isSuppressed(prepared.suppressions, rule.id, v.line))
    .sort((a, b) => a.line - b.line || a.column - b.column);
  return toRuleResult(rule.id, severity, violations);
}

export function summarizeFile(
  file: string,
  rules: RuleResult[],
  source?: string
): FileResult {
  // warnings are reported but never fail a file
  const overall_pass = rules.every((r) => r.pass || r.severity === 'warn');
  const result: FileResult = { file, overall_pass, rules };
  if (source !== undefined) result.source = source;
  return result;
}

export function engineErrorResult(file: string, e: unknown): FileResult {
  return {
    file,
    overall_pass: false,
    rules: [
      {
        id: 'engine_error',
        pass: false,
        severity: 'error',
        rationale: `Engine error: ${errorMessage(e)}`,
        suggested_fixes: [],
        violations: [],
      },
    ],
  };
}

export type LintOptions = {
  registry: RuleRegistry;
  settings?: Record<string, RuleSetting>;
  docs?: Map<string, RuleSpec>;
  includeSource?: boolean;
};

/** Lint an in-memory source with every enabled built-in rule. Throws ScanError on bad syntax. */
export function lintSource(
  text: string,
  file: string,
  options: LintOptions
): FileResult {
  const prepared = prepareSource(text, file);
  const results: RuleResult[] = [];
  for (const rule of options.registry.list()) {
    const severity = resolveSeverity(
      rule.id,
      rule.defaultSeverity,
      options.settings,
      options.docs
    );
    if (severity === 'off') continue;
    results.push(evaluateRule(rule, prepared, severity));
  }
  return summarizeFile(file, results, options.includeSource ? text : undefined);
}
