import { evaluateRule, prepareSource } from '../../evaluator';
import type { Violation } from '../../types';
import type { StyleRule } from '../types';

/** Run a single rule over an in-memory source. */
export function lintRule(rule: StyleRule, code: string, file = 'Component.jsx'): Violation[] {
  return evaluateRule(rule, prepareSource(code, file), rule.defaultSeverity).violations;
}

export function messages(rule: StyleRule, code: string, file?: string): string[] {
  return lintRule(rule, code, file).map((v) => v.message);
}
