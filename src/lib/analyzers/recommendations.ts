import { RuleViolation, SEVERITY_RANK } from '../types';

export const MAX_RECOMMENDATIONS = 10;
export const MIN_RECOMMENDATIONS = 3;

export const GENERIC_RECOMMENDATIONS: readonly string[] = [
  'Improve the contrast ratio across the whole page.',
  'Place the most important information near the top of the page.',
  'Make the navigation more intuitive.',
];

/**
 * Orders recommendation texts by severity, keeping the incoming order
 * (category order, then rule declaration order) for equal severities, and
 * tops short lists up from the generic pool.
 */
export function rankRecommendations(
  violations: readonly RuleViolation[],
  genericPool: readonly string[] = GENERIC_RECOMMENDATIONS
): string[] {
  const ranked = [...violations]
    .sort((a, b) => SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity])
    .map(v => v.recommendation);

  const top = [...new Set(ranked)].slice(0, MAX_RECOMMENDATIONS);
  if (top.length >= MIN_RECOMMENDATIONS) return top;

  const backfill = genericPool
    .filter((rec, i) => !top.includes(rec) && genericPool.indexOf(rec) === i)
    .slice(0, MIN_RECOMMENDATIONS - top.length);

  return [...top, ...backfill].slice(0, MAX_RECOMMENDATIONS);
}
