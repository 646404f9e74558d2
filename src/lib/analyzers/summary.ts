import {
  Category, CategoryStanding, CATEGORY_MAX_SCORES, CATEGORY_ORDER, SummaryView,
  getTier, TIER_LABELS,
} from '../types';

export const STRENGTH_THRESHOLD = 70;
export const WEAKNESS_THRESHOLD = 50;

export interface SummaryInput {
  totalScore: number;
  categories: Record<Category, number>;
  recommendations: readonly string[];
}

export function rankCategories(categories: Record<Category, number>): CategoryStanding[] {
  return CATEGORY_ORDER
    .map(category => {
      const maxScore = CATEGORY_MAX_SCORES[category];
      const score = categories[category];
      return { category, score, max_score: maxScore, percentage: (score / maxScore) * 100 };
    })
    .sort((a, b) => b.percentage - a.percentage);
}

export function classifySummary(input: SummaryInput): SummaryView {
  const tier = getTier(input.totalScore);
  const ranked = rankCategories(input.categories);

  // Both lists are cut from the same best-first ranking, so weaknesses are
  // the strongest of the categories below the threshold.
  const strengths = ranked.filter(c => c.percentage >= STRENGTH_THRESHOLD).slice(0, 3);
  const weaknesses = ranked.filter(c => c.percentage < WEAKNESS_THRESHOLD).slice(0, 3);

  return {
    overall_score: input.totalScore,
    tier,
    tier_label: TIER_LABELS[tier],
    strengths,
    weaknesses,
    top_recommendations: input.recommendations.slice(0, 5),
  };
}
