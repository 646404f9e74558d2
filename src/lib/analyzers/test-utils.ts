import { RULE_CATALOG, RuleDefinition } from './rules';

export function getRule(id: string): RuleDefinition | undefined {
  for (const definition of Object.values(RULE_CATALOG)) {
    const rule = definition.rules.find(r => r.id === id);
    if (rule) return rule;
  }
  return undefined;
}
