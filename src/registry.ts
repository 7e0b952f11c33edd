// src/registry.ts
import { ErrorCode, RuleError } from './errors';
import { BUILTIN_RULES, type RuleCategory, type StyleRule } from './rules';

export class RuleRegistry {
  private readonly rules = new Map<string, StyleRule>();

  register(rule: StyleRule): this {
    if (this.rules.has(rule.id)) {
      throw new RuleError(
        `Rule "${rule.id}" is already registered`,
        ErrorCode.RULE_DUPLICATE
      );
    }
    this.rules.set(rule.id, rule);
    return this;
  }

  get(id: string): StyleRule | undefined {
    return this.rules.get(id);
  }

  has(id: string): boolean {
    return this.rules.has(id);
  }

  // sorted so outputs stay stable (alphabetical by id)
  list(): StyleRule[] {
    return [...this.rules.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  byCategory(category: RuleCategory): StyleRule[] {
    return this.list().filter((r) => r.category === category);
  }

  get size(): number {
    return this.rules.size;
  }
}

export function createDefaultRegistry(): RuleRegistry {
  const registry = new RuleRegistry();
  for (const rule of BUILTIN_RULES) registry.register(rule);
  return registry;
}
