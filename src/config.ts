/**
 * Configuration
 *
 * Settings resolve in order: defaults, then `.reactstylerc.json` (or --config),
 * then environment variables, then CLI flags.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, ErrorCode, errorMessage } from './errors';
import type { CLIOpts, ReportFormat, RuleSetting } from './types';

export const DEFAULT_CONFIG_FILE = '.reactstylerc.json';
export const DEFAULT_MODEL = 'gpt-5';
export const DEFAULT_INCLUDE = ['src/**/*.{js,jsx,ts,tsx}'];
export const DEFAULT_IGNORE = ['**/node_modules/**', '**/dist/**', '**/*.d.ts'];
export const DEFAULT_FILE_CONCURRENCY = 16;
export const DEFAULT_RULE_CONCURRENCY = 8;

export const RuleSettingSchema = z.enum(['off', 'warn', 'error']);

export const ReportFormatSchema = z.enum(['md', 'html', 'all', 'none']);

export const ConfigFileSchema = z
  .object({
    /** Glob patterns for files to lint */
    include: z.array(z.string().min(1)).optional(),
    /** Glob patterns to skip */
    ignore: z.array(z.string().min(1)).optional(),
    /** Per-rule severity overrides */
    rules: z.record(RuleSettingSchema).optional(),
    rulesDir: z.string().min(1).optional(),
    llm: z.boolean().optional(),
    model: z.string().min(1).optional(),
    format: ReportFormatSchema.optional(),
    reportPath: z.string().min(1).optional(),
    outBase: z.string().min(1).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type ResolvedConfig = {
  include: string[];
  ignore: string[];
  rules: Record<string, RuleSetting>;
  rulesDir: string;
  llm: boolean;
  model: string;
  apiKey?: string;
  format: ReportFormat;
  reportPath: string | null;
  outBase: string;
  showPassDetails: boolean;
  quiet: boolean;
  includeSource: boolean;
  expandSource: boolean;
  fileConcurrency: number;
  ruleConcurrency: number;
  positional: string[];
};

/**
 * Read and validate a config file. A missing file is only an error when the
 * path was given explicitly.
 */
export async function loadConfigFile(
  filePath: string,
  required: boolean
): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (e) {
    if (!required) return {};
    throw new ConfigError(
      `Cannot read config file ${filePath}: ${errorMessage(e)}`,
      ErrorCode.CONFIG_UNREADABLE
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Invalid JSON in ${filePath}: ${errorMessage(e)}`);
  }

  const parsed = ConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config in ${filePath}: ${issues}`);
  }
  return parsed.data;
}

function positiveInt(value: string | number | undefined, name: string) {
  if (value === undefined || value === '') return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`, ErrorCode.USAGE);
  }
  return n;
}

function formatFrom(value: string | undefined, source: string): ReportFormat | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = ReportFormatSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(
      `${source} must be one of md, html, all, none; got "${value}"`,
      ErrorCode.USAGE
    );
  }
  return parsed.data;
}

export function resolveConfig(
  cli: CLIOpts,
  file: ConfigFile,
  env: NodeJS.ProcessEnv,
  cwd: string
): ResolvedConfig {
  const abs = (p: string) => path.resolve(cwd, p);

  const reportPath = cli.noReport
    ? null
    : cli.reportPath ?? env.REPORT_PATH ?? file.reportPath ?? 'reports/lint.json';

  return {
    include: cli.only ? [cli.only] : file.include ?? DEFAULT_INCLUDE,
    ignore: file.ignore ?? DEFAULT_IGNORE,
    rules: file.rules ?? {},
    rulesDir: abs(cli.rulesDir ?? file.rulesDir ?? 'rules'),
    llm: cli.llm || file.llm || false,
    model: cli.model ?? env.REACT_STYLE_MODEL ?? file.model ?? DEFAULT_MODEL,
    apiKey: env.OPENAI_API_KEY || undefined,
    format:
      cli.format ?? formatFrom(env.REPORT_FORMAT, 'REPORT_FORMAT') ?? file.format ?? 'md',
    reportPath: reportPath ? abs(reportPath) : null,
    outBase: abs(cli.outBase ?? env.REPORT_OUT ?? file.outBase ?? 'reports/lint'),
    showPassDetails: !!cli.showPassDetails,
    quiet: !!cli.quiet,
    includeSource: !!cli.includeSource,
    expandSource: !!cli.expandSource,
    fileConcurrency:
      positiveInt(cli.fileConcurrency, '--file-concurrency') ??
      positiveInt(env.FILE_CONCURRENCY, 'FILE_CONCURRENCY') ??
      DEFAULT_FILE_CONCURRENCY,
    ruleConcurrency:
      positiveInt(cli.ruleConcurrency, '--rule-concurrency') ??
      positiveInt(env.RULE_CONCURRENCY, 'RULE_CONCURRENCY') ??
      DEFAULT_RULE_CONCURRENCY,
    positional: cli.positional.map(abs),
  };
}

export async function loadConfig(
  cli: CLIOpts,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Promise<ResolvedConfig> {
  const explicit = cli.config ?? null;
  const file = await loadConfigFile(
    path.resolve(cwd, explicit ?? DEFAULT_CONFIG_FILE),
    explicit !== null
  );
  return resolveConfig(cli, file, env, cwd);
}

/** Reject severity overrides for rules nobody registered. */
export function validateRuleSettings(
  rules: Record<string, RuleSetting>,
  known: Set<string>
) {
  const unknown = Object.keys(rules).filter((id) => !known.has(id));
  if (unknown.length) {
    throw new ConfigError(
      `Unknown rule${unknown.length > 1 ? 's' : ''} in config: ${unknown.join(', ')}`,
      ErrorCode.CONFIG_UNKNOWN_RULE
    );
  }
}
