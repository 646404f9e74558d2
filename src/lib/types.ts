import type { HtmlFeatureMap } from './analyzers/html-analyzer';
import type { ImageFeatureMap } from './analyzers/image-analyzer';

export type Category =
  | 'information_architecture'
  | 'cta_visibility'
  | 'readability'
  | 'form_ux'
  | 'accessibility'
  | 'performance';

export type Severity = 'high' | 'medium' | 'low';

export type DeviceType = 'desktop' | 'tablet' | 'mobile';

export type ScoreTier = 'excellent' | 'good' | 'fair' | 'poor';

export type AnalysisPhase = 'capturing' | 'extracting-html' | 'extracting-image' | 'scoring';

export interface Viewport {
  width: number;
  height: number;
}

export interface DeviceProfile {
  viewport: Viewport;
  userAgent: string;
}

export const DEVICE_PROFILES: Readonly<Record<DeviceType, DeviceProfile>> = {
  desktop: {
    viewport: { width: 1920, height: 1080 },
    userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  },
  tablet: {
    viewport: { width: 768, height: 1024 },
    userAgent: 'Mozilla/5.0 (iPad; CPU OS 17_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Mobile/15E148 Safari/604.1',
  },
  mobile: {
    viewport: { width: 375, height: 667 },
    userAgent: 'Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Mobile/15E148 Safari/604.1',
  },
};

export interface PageCapture {
  url: string;
  html: string;
  title: string;
  statusCode: number;
  deviceType: DeviceType;
  viewport: Viewport;
  loadTime: number;
}

// Evaluation and recommendation tie-break order.
export const CATEGORY_ORDER: readonly Category[] = [
  'information_architecture',
  'cta_visibility',
  'readability',
  'form_ux',
  'accessibility',
  'performance',
];

export const CATEGORY_MAX_SCORES: Readonly<Record<Category, number>> = {
  information_architecture: 30,
  cta_visibility: 20,
  readability: 20,
  form_ux: 15,
  accessibility: 10,
  performance: 5,
};

export const CATEGORY_LABELS: Readonly<Record<Category, string>> = {
  information_architecture: 'Information Architecture',
  cta_visibility: 'CTA Visibility',
  readability: 'Readability',
  form_ux: 'Form UX',
  accessibility: 'Accessibility',
  performance: 'Performance',
};

export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  high: 3,
  medium: 2,
  low: 1,
};

export interface RuleViolation {
  ruleId: string;
  category: Category;
  description: string;
  severity: Severity;
  passed: false;
  scoreImpact: number;
  recommendation: string;
}

export interface CategoryResult {
  category: Category;
  score: number;
  maxScore: number;
  violations: RuleViolation[];
}

export interface AnalysisScoreReport {
  totalScore: number;
  categories: Record<Category, number>;
  categoryDetails: Record<Category, CategoryResult>;
  violations: RuleViolation[];
  recommendations: string[];
}

export interface CategoryStanding {
  category: Category;
  score: number;
  max_score: number;
  percentage: number;
}

export interface SummaryView {
  overall_score: number;
  tier: ScoreTier;
  tier_label: string;
  strengths: CategoryStanding[];
  weaknesses: CategoryStanding[];
  top_recommendations: string[];
}

// Wire shapes below follow the snake_case contract the API answers with.

export interface RuleResultPayload {
  rule_id: string;
  category: Category;
  description: string;
  severity: Severity;
  passed: boolean;
  score_impact: number;
  recommendation: string;
}

export interface CategoryDetailPayload {
  score: number;
  max_score: number;
  rules: RuleResultPayload[];
}

export interface AnalysisReportPayload {
  total_score: number;
  categories: Record<Category, number>;
  recommendations: string[];
  category_details: Record<Category, CategoryDetailPayload>;
}

export interface AnalysisResult extends AnalysisReportPayload {
  analysis_id: string;
  url: string;
  device_type: DeviceType;
  timestamp: string;
  page_title: string;
  analysis_time: number;
  summary: SummaryView;
  html_analysis: HtmlFeatureMap;
  image_analysis: ImageFeatureMap;
}

export function getTier(totalScore: number): ScoreTier {
  if (totalScore >= 80) return 'excellent';
  if (totalScore >= 60) return 'good';
  if (totalScore >= 40) return 'fair';
  return 'poor';
}

export const TIER_LABELS: Readonly<Record<ScoreTier, string>> = {
  excellent: 'Excellent',
  good: 'Good',
  fair: 'Fair',
  poor: 'Needs improvement',
};

export function mapCategories<T>(fn: (category: Category) => T): Record<Category, T> {
  return {
    information_architecture: fn('information_architecture'),
    cta_visibility: fn('cta_visibility'),
    readability: fn('readability'),
    form_ux: fn('form_ux'),
    accessibility: fn('accessibility'),
    performance: fn('performance'),
  };
}
