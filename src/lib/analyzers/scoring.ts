import {
  AnalysisReportPayload, AnalysisScoreReport, Category, CategoryResult, CATEGORY_ORDER,
  RuleResultPayload, RuleViolation, mapCategories,
} from '../types';
import { FeatureMap, resolveFeatures } from './features';
import { evaluateCategory } from './evaluator';
import { rankRecommendations } from './recommendations';

export function aggregateScores(results: readonly CategoryResult[]): AnalysisScoreReport {
  const byCategory = new Map<Category, CategoryResult>();
  for (const result of results) {
    byCategory.set(result.category, result);
  }

  const details = mapCategories(category => {
    const result = byCategory.get(category);
    if (!result) {
      throw new Error(`Missing result for category ${category}`);
    }
    return result;
  });
  const ordered = CATEGORY_ORDER.map(category => details[category]);

  // Each category is already clamped to [0, max] and the maxima sum to 100,
  // so the total needs no clamp of its own.
  const totalScore = ordered.reduce((sum, r) => sum + r.score, 0);
  const violations = ordered.flatMap(r => r.violations);

  return {
    totalScore,
    categories: mapCategories(category => details[category].score),
    categoryDetails: details,
    violations,
    recommendations: rankRecommendations(violations),
  };
}

export function analyzeHeuristics(featureMap: FeatureMap): AnalysisScoreReport {
  const features = resolveFeatures(featureMap);
  return aggregateScores(CATEGORY_ORDER.map(category => evaluateCategory(category, features)));
}

function toRulePayload(v: RuleViolation): RuleResultPayload {
  return {
    rule_id: v.ruleId,
    category: v.category,
    description: v.description,
    severity: v.severity,
    passed: v.passed,
    score_impact: v.scoreImpact,
    recommendation: v.recommendation,
  };
}

export function serializeReport(report: AnalysisScoreReport): AnalysisReportPayload {
  return {
    total_score: report.totalScore,
    categories: { ...report.categories },
    recommendations: [...report.recommendations],
    category_details: mapCategories(category => {
      const result = report.categoryDetails[category];
      return {
        score: result.score,
        max_score: result.maxScore,
        rules: result.violations.map(toRulePayload),
      };
    }),
  };
}
