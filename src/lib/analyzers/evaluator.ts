import { Category, CategoryResult, RuleViolation } from '../types';
import { Features } from './features';
import { RULE_CATALOG, RuleDefinition } from './rules';

function toViolation(rule: RuleDefinition, features: Features): RuleViolation {
  return {
    ruleId: rule.id,
    category: rule.category,
    description: typeof rule.description === 'function' ? rule.description(features) : rule.description,
    severity: rule.severity,
    passed: false,
    scoreImpact: rule.scoreImpact,
    recommendation: rule.recommendation,
  };
}

export function evaluateCategory(category: Category, features: Features): CategoryResult {
  const definition = RULE_CATALOG[category];

  if (definition.applies && !definition.applies(features)) {
    return { category, score: definition.maxScore, maxScore: definition.maxScore, violations: [] };
  }

  const violations = definition.rules
    .filter(rule => rule.triggered(features))
    .map(rule => toViolation(rule, features));
  const raw = violations.reduce((score, v) => score + v.scoreImpact, definition.maxScore);

  return {
    category,
    score: Math.max(0, raw),
    maxScore: definition.maxScore,
    violations,
  };
}
