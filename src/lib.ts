// Public API for using the linter as a library.
export { RuleRegistry, createDefaultRegistry } from './registry';
export { BUILTIN_RULES } from './rules';
export type { RuleCategory, RuleFinding, StyleRule } from './rules';
export { scanSource, lineAndColumn, type ScannedSource } from './scanner';
export {
  lintSource,
  evaluateRule,
  parseSuppressions,
  isSuppressed,
  summarizeFile,
  type LintOptions,
} from './evaluator';
export { lintFile, type LintContext } from './linter';
export { checkDocument, parseMarkdown, DOC_RULES, type DocRule } from './docs/doc-check';
export { judgeRule, buildPrompt, OpenAIModelClient, type ModelClient } from './judge';
export { loadConfig, resolveConfig, type ResolvedConfig } from './config';
export { renderMarkdownReport, renderHtmlReport, writePrettyReport } from './reporters';
export { loadAllRules, buildSummary } from './utils';
export * from './errors';
export type * from './types';
