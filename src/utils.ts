import path from 'node:path';
import fg from 'fast-glob';
import fs from 'node:fs/promises';
import matter from 'gray-matter';
import { ReportFormatSchema } from './config';
import { ConfigError, ErrorCode } from './errors';
import type {
  CLIOpts,
  FileResult,
  RuleLogOpts,
  RuleResult,
  RuleSpec,
  Summary,
  SummaryRenderOptions,
} from './types';

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

function ms(t: number) {
  return `${t} ms`;
}

// ---------- Helpers ----------

const USAGE = `Usage: react-style-lint [options] [files...]

Options:
  --only <glob>              lint files matching this glob instead of config include
  --config <path>            config file (default: .reactstylerc.json)
  --rules-dir <dir>          rule documents directory (default: rules)
  --report <path>            JSON summary path
  --no-report                do not write the JSON summary
  --format <md|html|all|none>
  --out <base>               pretty report base path (default: reports/lint)
  --show-pass-details        show rationale/fixes for passed rules
  --quiet                    only log failing rules
  --llm                      judge llm rule documents with the model
  --model <id>               model id for llm rules
  --include-source           embed file source in pretty reports
  --expand-source            expand embedded source by default
  --file-concurrency <n>
  --rule-concurrency <n>
  -h, --help`;

export function usage() {
  return USAGE;
}

function flagValue(argv: string[], i: number, flag: string): string {
  const v = argv[i];
  if (v === undefined || v.startsWith('--')) {
    throw new ConfigError(`Missing value for ${flag}`, ErrorCode.USAGE);
  }
  return v;
}

export function parseCLI(argv: string[]): CLIOpts & { help?: boolean } {
  const opts: CLIOpts & { help?: boolean } = {
    positional: [],
    showPassDetails: false,
    noReport: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    switch (a) {
      case '--only':
        opts.only = flagValue(argv, ++i, a);
        break;
      case '--config':
        opts.config = flagValue(argv, ++i, a);
        break;
      case '--rules-dir':
        opts.rulesDir = flagValue(argv, ++i, a);
        break;
      case '--report':
        opts.reportPath = flagValue(argv, ++i, a);
        break;
      case '--model':
        opts.model = flagValue(argv, ++i, a);
        break;
      case '--format': {
        const value = flagValue(argv, ++i, a);
        const parsed = ReportFormatSchema.safeParse(value);
        if (!parsed.success) {
          throw new ConfigError(`Unknown report format: ${value}`, ErrorCode.USAGE);
        }
        opts.format = parsed.data;
        break;
      }
      case '--out':
        opts.outBase = flagValue(argv, ++i, a);
        break;
      case '--show-pass-details':
      case '--show-pass-rationale':
        opts.showPassDetails = true;
        break;
      case '--quiet':
        opts.quiet = true;
        break;
      case '--llm':
        opts.llm = true;
        break;
      case '--include-source':
        opts.includeSource = true;
        break;
      case '--expand-source':
        opts.includeSource = true;
        opts.expandSource = true;
        break;
      case '--file-concurrency':
        opts.fileConcurrency = Number(flagValue(argv, ++i, a));
        break;
      case '--rule-concurrency':
        opts.ruleConcurrency = Number(flagValue(argv, ++i, a));
        break;
      case '--no-report':
        opts.noReport = true;
        break;
      case '-h':
      case '--help':
        opts.help = true;
        break;
      default:
        if (a.startsWith('-')) {
          throw new ConfigError(`Unknown flag: ${a}`, ErrorCode.USAGE);
        }
        opts.positional.push(a); // treat as file path
    }
  }
  return opts;
}

// ---------- Small, dependency-free promise pool ----------
export async function runPool<T>(
  tasks: Array<() => Promise<T>>,
  limit: number
): Promise<T[]> {
  const results: T[] = [];
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

function detailLines(res: RuleResult, maxFixes: number): string[] {
  const indent = '      '; // 6 spaces to align nicely
  const lines: string[] = [];
  if (res.violations.length) {
    for (const v of res.violations) {
      lines.push(
        `${indent}${color.yellow('•')} ${color.gray(`${v.line}:${v.column}`)} ${v.message}`
      );
    }
  } else if (res.rationale) {
    lines.push(`${indent}${color.yellow('•')} ${color.yellow('rationale:')} ${res.rationale}`);
  }
  const show = res.suggested_fixes.slice(0, maxFixes);
  for (const fx of show) {
    lines.push(`${indent}${color.cyan('•')} ${color.cyan('fix:')} ${fx}`);
  }
  const extra = res.suggested_fixes.length - show.length;
  if (extra > 0) {
    lines.push(
      `${indent}${color.cyan(`(+${extra} more suggestion${extra > 1 ? 's' : ''})`)}`
    );
  }
  return lines;
}

function statusLabel(res: RuleResult) {
  if (res.pass) return color.green('PASS');
  return res.severity === 'warn' ? color.yellow('WARN') : color.red('FAIL');
}

// compact rule-level log
export async function runRuleWithLogs(
  id: string,
  builder: () => Promise<RuleResult>,
  opts: RuleLogOpts = {}
): Promise<RuleResult> {
  const start = Date.now();
  const fileLabel = opts.filePath
    ? color.dim(`[${path.basename(opts.filePath)}]`)
    : color.dim('[rule]');

  let res: RuleResult;
  try {
    res = await builder();
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    res = {
      id,
      pass: false,
      severity: opts.severity ?? 'error',
      rationale: message,
      suggested_fixes: [],
      violations: [],
    };
  }

  if (res.pass && opts.quiet) return res;

  const elapsed = ms(Date.now() - start);
  // Build one atomic block so lines don't interleave
  const lines = [
    `  ${fileLabel} ${color.bold('▶')} ${color.bold(id)}  ${statusLabel(res)}  ${color.gray(
      `(${elapsed})`
    )}`,
  ];
  if (!res.pass || opts.showPassDetails) lines.push(...detailLines(res, 3));
  console.log(lines.join('\n'));
  return res;
}

/** Errors count failing error-severity rules; a rule without positions counts once. */
function problemCount(files: FileResult[], severity: RuleResult['severity']) {
  return files
    .flatMap((f) => f.rules)
    .filter((r) => !r.pass && r.severity === severity)
    .reduce((n, r) => n + Math.max(1, r.violations.length), 0);
}

export function buildSummary(files: FileResult[], model: string | null): Summary {
  return {
    model,
    checked: files.length,
    passed: files.filter((f) => f.overall_pass).length,
    failed: files.filter((f) => !f.overall_pass).length,
    errors: problemCount(files, 'error'),
    warnings: problemCount(files, 'warn'),
    files,
  };
}

// high-contrast final report
export function renderConsoleReport(summary: Summary, opts: SummaryRenderOptions = {}) {
  const { model, checked, passed, failed, errors, warnings, files } = summary;
  const { showPassDetails = false } = opts;

  const hr = color.dim('─'.repeat(70));
  const title = color.bold('📄  React Style Lint Report');
  const meta =
    (model ? `${color.dim('Model')}: ${color.bold(model)}  ${color.dim('•')} ` : '') +
    `${color.dim('Files')}: ${color.bold(String(checked))}  ${color.dim('•')} ` +
    `${color.green(`${passed} passed`)}  ${color.dim('•')} ${color.red(`${failed} failed`)}  ` +
    `${color.dim('•')} ${color.red(`${errors} errors`)}, ${color.yellow(`${warnings} warnings`)}`;

  console.log('\n' + hr);
  console.log(title);
  console.log(meta);
  console.log(hr);

  for (const f of files) {
    const fileIcon = f.overall_pass ? color.green('✅') : color.red('❌');
    const passedCount = f.rules.filter((r) => r.pass).length;
    const failedCount = f.rules.length - passedCount;

    console.log(
      '\n' +
        `${fileIcon} ${color.bold(path.relative(process.cwd(), f.file) || f.file)}  ` +
        color.dim(`(${passedCount} passed, ${failedCount} failed)`)
    );

    // Failed first (always detailed)
    const failedRules = f.rules.filter((r) => !r.pass);
    if (failedRules.length) {
      console.log(`  ${color.red('Failed rules:')}`);
      for (const r of failedRules) {
        const mark = r.severity === 'warn' ? color.yellow('!') : color.red('✖');
        console.log(`    ${mark} ${color.bold(r.id)}`);
        for (const line of detailLines(r, 3)) console.log(line);
      }
    }

    // Passed next, names only unless asked
    const passedRules = f.rules.filter((r) => r.pass);
    if (passedRules.length) {
      console.log(`  ${color.green('Passed rules:')}`);
      for (const r of passedRules) {
        console.log(`    ${color.green('✔')} ${color.bold(r.id)}`);
        if (showPassDetails) {
          for (const line of detailLines(r, 2)) console.log(line);
        }
      }
    }
  }

  console.log('\n' + hr);
  console.log(failed ? color.red('Result: FAIL') : color.green('Result: PASS'));
  console.log(hr + '\n');
}

export async function getTargets(
  patterns: string[],
  ignore: string[] = [],
  cwd: string = process.cwd()
): Promise<string[]> {
  const files = await fg(patterns, { cwd, ignore, dot: false, onlyFiles: true, absolute: true });
  return files.map((f) => path.resolve(f)).sort();
}

function isMissing(e: unknown) {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}

/**
 * Load rule documents (guideline text with bad/good examples) from a flat directory.
 * - `id` comes from front-matter, or the file name (without ext).
 * - `severity` defaults to "error".
 * - `engine` defaults to "static" when a built-in rule has the id, otherwise "llm".
 * A missing directory means there are no rule documents.
 */
export async function loadAllRules(dir: string, builtinIds: Set<string>): Promise<RuleSpec[]> {
  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (e) {
    if (isMissing(e)) return [];
    throw e;
  }
  const files = entries
    .filter((d) => d.isFile())
    .map((d) => path.join(dir, d.name))
    .filter((f) => f.endsWith('.md') || f.endsWith('.markdown'));

  const rules: RuleSpec[] = [];
  for (const filePath of files) {
    const raw = await fs.readFile(filePath, 'utf8');
    const parsed = matter(raw);
    const fm: Record<string, unknown> = parsed.data ?? {};
    const id =
      typeof fm.id === 'string' && fm.id.trim()
        ? fm.id.trim()
        : path.basename(filePath).replace(/\.(md|markdown)$/i, '');
    const severity = fm.severity === 'warn' ? 'warn' : 'error';
    const summary = typeof fm.summary === 'string' ? fm.summary : undefined;
    const engine =
      fm.engine === 'llm' || fm.engine === 'static'
        ? fm.engine
        : builtinIds.has(id)
          ? 'static'
          : 'llm';

    rules.push({
      id,
      severity,
      summary,
      engine,
      markdown: parsed.content.trim(),
      filePath,
    });
  }

  rules.sort((a, b) => a.id.localeCompare(b.id));
  return rules;
}
