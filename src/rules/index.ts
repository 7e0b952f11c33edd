/**
 * Built-in rules, one per style-guide guideline.
 */

import { declarationRules } from './declaration';
import { formattingRules } from './jsx-format';
import { methodRules } from './methods';
import { namingRules } from './naming';
import { orderingRules } from './ordering';
import { propsRules } from './props';
import type { StyleRule } from './types';

export const BUILTIN_RULES: StyleRule[] = [
  ...namingRules,
  ...declarationRules,
  ...formattingRules,
  ...propsRules,
  ...methodRules,
  ...orderingRules,
];

export type { RuleCategory, RuleFinding, StyleRule } from './types';
