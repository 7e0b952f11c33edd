// src/linter.ts
import fs from 'node:fs/promises';
import path from 'node:path';
import { checkDocument } from './docs/doc-check';
import { evaluateRule, prepareSource, resolveSeverity, summarizeFile } from './evaluator';
import { judgeRule, type ModelClient } from './judge';
import type { RuleRegistry } from './registry';
import { MARKDOWN_EXTENSIONS } from './scanner';
import type { FileResult, RuleResult, RuleSetting, RuleSpec } from './types';
import { color, runPool, runRuleWithLogs } from './utils';

export type LintContext = {
  registry: RuleRegistry;
  settings: Record<string, RuleSetting>;
  /** Loaded rule documents; only `engine: llm` ones add checks here. */
  docs: RuleSpec[];
  /** Judges llm rules. Without one they are skipped. */
  judge?: ModelClient | null;
  ruleConcurrency: number;
  includeSource?: boolean;
  showPassDetails?: boolean;
  quiet?: boolean;
  exists?: (p: string) => boolean;
};

export function isMarkdownFile(file: string) {
  return MARKDOWN_EXTENSIONS.includes(path.extname(file).toLowerCase());
}

function logFileSummary(file: string, results: RuleResult[], overallPass: boolean) {
  const passed = results.filter((r) => r.pass).length;
  const failed = results.length - passed;
  console.log(
    `  ${color.dim(`[${path.basename(file)}]`)} ${color.bold('▶ Summary')}: ${passed} passed, ${failed} failed  ${
      overallPass ? '✅' : '❌'
    }`
  );
}

/**
 * Lint one file from disk. Markdown goes to the doc checker, everything else
 * through the scanner and the registry's rules (rules run in parallel with a limit).
 * Throws on unreadable files and syntax errors; the caller turns those into
 * an engine_error result.
 */
export async function lintFile(file: string, ctx: LintContext): Promise<FileResult> {
  const text = await fs.readFile(file, 'utf8');
  const logOpts = { filePath: file, showPassDetails: ctx.showPassDetails, quiet: ctx.quiet };

  console.log(color.bold(`\n📄 ${path.relative(process.cwd(), file) || file}`));

  let results: RuleResult[];
  if (isMarkdownFile(file)) {
    const checked = checkDocument(text, file, { settings: ctx.settings, exists: ctx.exists });
    results = [];
    for (const r of checked) {
      results.push(await runRuleWithLogs(r.id, async () => r, { ...logOpts, severity: r.severity }));
    }
  } else {
    const prepared = prepareSource(text, file);
    const docsById = new Map(ctx.docs.map((d) => [d.id, d]));

    const tasks: Array<() => Promise<RuleResult>> = [];
    for (const rule of ctx.registry.list()) {
      const severity = resolveSeverity(rule.id, rule.defaultSeverity, ctx.settings, docsById);
      if (severity === 'off') continue;
      tasks.push(() =>
        runRuleWithLogs(rule.id, async () => evaluateRule(rule, prepared, severity), {
          ...logOpts,
          severity,
        })
      );
    }

    const judge = ctx.judge;
    if (judge) {
      for (const doc of ctx.docs.filter((d) => d.engine === 'llm')) {
        const severity = resolveSeverity(doc.id, doc.severity, ctx.settings);
        if (severity === 'off') continue;
        tasks.push(() =>
          runRuleWithLogs(doc.id, () => judgeRule(judge, doc, file, text, severity), {
            ...logOpts,
            severity,
          })
        );
      }
    }

    results = await runPool(tasks, ctx.ruleConcurrency);
  }

  const result = summarizeFile(file, results, ctx.includeSource ? text : undefined);
  logFileSummary(file, results, result.overall_pass);
  return result;
}
