import type ts from 'typescript';
import type { ScannedSource } from '../scanner';
import type { Severity } from '../types';

export type RuleCategory =
  | 'naming'
  | 'declaration'
  | 'alignment'
  | 'quotes'
  | 'spacing'
  | 'props'
  | 'refs'
  | 'parentheses'
  | 'tags'
  | 'methods'
  | 'ordering'
  | 'accessibility';

/** A raw match from a rule, before the evaluator attaches severity and position. */
export type RuleFinding = {
  node?: ts.Node;
  pos?: number; // used when there is no single node to point at
  message: string;
  suggestion?: string;
};

/** Single style-guide rule definition (description + runnable check). */
export interface StyleRule {
  id: string;
  category: RuleCategory;
  description: string;
  defaultSeverity: Severity;
  check(source: ScannedSource): RuleFinding[];
}
