#!/usr/bin/env node
import path from 'node:path';
import { loadConfig, validateRuleSettings, type ResolvedConfig } from './config';
import { DOC_RULES } from './docs/doc-check';
import { ErrorCode, ConfigError, LintError, errorMessage } from './errors';
import { engineErrorResult } from './evaluator';
import { OpenAIModelClient, type ModelClient } from './judge';
import { lintFile, type LintContext } from './linter';
import { createDefaultRegistry } from './registry';
import { writeJsonReport, writePrettyReport } from './reporters';
import type { FileResult, RuleSpec } from './types';
import {
  buildSummary,
  color,
  getTargets,
  loadAllRules,
  parseCLI,
  renderConsoleReport,
  runPool,
  usage,
} from './utils';

export type MainDeps = {
  /** Replaces the OpenAI client for llm rules. */
  createJudge?: (apiKey: string, model: string) => ModelClient;
};

const rel = (p: string) => path.relative(process.cwd(), p) || p;

async function loadRuleDocs(config: ResolvedConfig, builtinIds: Set<string>) {
  const docs = await loadAllRules(config.rulesDir, builtinIds);
  const usable: RuleSpec[] = [];
  for (const doc of docs) {
    if (doc.engine === 'static' && !builtinIds.has(doc.id)) {
      console.warn(
        color.yellow(
          `⚠️  ${rel(doc.filePath)}: no built-in rule "${doc.id}" for this static rule document; ignoring it.`
        )
      );
      continue;
    }
    if (doc.engine === 'llm' && builtinIds.has(doc.id)) {
      console.warn(
        color.yellow(
          `⚠️  ${rel(doc.filePath)}: "${doc.id}" is a built-in rule, so this llm rule document is ignored.`
        )
      );
      continue;
    }
    usable.push(doc);
  }
  return usable;
}

function createJudge(config: ResolvedConfig, llmDocs: RuleSpec[], deps: MainDeps) {
  if (!config.llm) {
    if (llmDocs.length) {
      console.log(
        color.dim(
          `Skipping ${llmDocs.length} LLM rule${llmDocs.length > 1 ? 's' : ''} (${llmDocs
            .map((d) => d.id)
            .join(', ')}); pass --llm to judge them.`
        )
      );
    }
    return null;
  }
  if (!config.apiKey) {
    throw new ConfigError('OPENAI_API_KEY is not set.', ErrorCode.MODEL_NOT_CONFIGURED);
  }
  if (!llmDocs.length) return null;
  return deps.createJudge
    ? deps.createJudge(config.apiKey, config.model)
    : new OpenAIModelClient(config.apiKey, config.model);
}

/** Run the linter and return the process exit code. */
export async function main(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  deps: MainDeps = {}
): Promise<number> {
  let config: ResolvedConfig;
  let ctx: LintContext;
  try {
    const cli = parseCLI(argv);
    if (cli.help) {
      console.log(usage());
      return 0;
    }
    config = await loadConfig(cli, env, cwd);

    const registry = createDefaultRegistry();
    const builtinIds = new Set(registry.list().map((r) => r.id));
    const docs = await loadRuleDocs(config, builtinIds);
    validateRuleSettings(
      config.rules,
      new Set([...builtinIds, ...DOC_RULES.map((r) => r.id), ...docs.map((d) => d.id)])
    );

    const judge = createJudge(
      config,
      docs.filter((d) => d.engine === 'llm'),
      deps
    );
    ctx = {
      registry,
      settings: config.rules,
      docs,
      judge,
      ruleConcurrency: config.ruleConcurrency,
      includeSource: config.includeSource,
      showPassDetails: config.showPassDetails,
      quiet: config.quiet,
    };
  } catch (e) {
    if (e instanceof LintError) {
      console.error(color.red(e.toString()));
      if (e.code === ErrorCode.USAGE) console.error(usage());
      return 2;
    }
    throw e;
  }

  // Allow passing explicit file paths (first non-flag args)
  const targets = config.positional.length
    ? config.positional
    : await getTargets(config.include, config.ignore, cwd);

  if (targets.length === 0) {
    console.log(`No files matched ${config.include.join(', ')} and no CLI targets provided.`);
    return 0;
  }

  // Build file-level tasks
  const fileTasks = targets.map((f) => {
    return async (): Promise<FileResult> => {
      try {
        return await lintFile(f, ctx);
      } catch (e) {
        console.error(color.red(`  ${rel(f)}: ${errorMessage(e)}`));
        return engineErrorResult(f, e);
      }
    };
  });

  // Run files in parallel with limit
  const out = await runPool(fileTasks, config.fileConcurrency);
  const summary = buildSummary(out, ctx.judge ? ctx.judge.model : null);

  if (config.reportPath) {
    await writeJsonReport(summary, config.reportPath);
  }

  renderConsoleReport(summary, { showPassDetails: config.showPassDetails });
  await writePrettyReport(summary, {
    format: config.format,
    outBasePath: config.outBase,
    showPassDetails: config.showPassDetails,
    includeSource: config.includeSource,
    expandSource: config.expandSource,
  });

  return summary.failed > 0 ? 1 : 0;
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err) => {
      console.error(err);
      process.exit(1);
    }
  );
}
