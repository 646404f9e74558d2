import { describe, expect, it } from 'vitest';
import { evaluateCategory } from './evaluator';
import { FeatureMap, resolveFeatures } from './features';
import { RULE_CATALOG } from './rules';
import { Category, CATEGORY_MAX_SCORES, CATEGORY_ORDER } from '../types';

function makeFeatures(overrides: FeatureMap = {}): FeatureMap {
  return {
    html: {
      heading_analysis: { has_h1: true, multiple_h1: false, hierarchy_issues: [] },
      navigation_analysis: { has_breadcrumbs: true, duplicate_link_texts: 0 },
      form_analysis: { form_count: 0 },
      accessibility_analysis: { alt_text_coverage: 1, aria_elements_count: 3, landmark_roles_count: 2, total_images: 4 },
      meta_analysis: { title_length: 30, description_length: 120, structured_data_count: 1, has_og_image: true },
      content_analysis: { avg_paragraph_length: 80 },
      ...overrides.html,
    },
    image: {
      above_fold_analysis: { has_cta_above_fold: true },
      ocr_analysis: { button_texts: ['Sign up'] },
      contrast_analysis: { has_good_contrast: true, is_low_contrast: false },
      visual_density: { is_cluttered: false, has_sufficient_whitespace: true },
      element_detection: { button_candidates: 3, input_candidates: 2 },
      ...overrides.image,
    },
  };
}

function ruleIds(category: Category, map: FeatureMap): string[] {
  return evaluateCategory(category, resolveFeatures(map)).violations.map(v => v.ruleId);
}

describe('rule catalog', () => {
  it('has category maxima that sum to 100', () => {
    const total = CATEGORY_ORDER.reduce((sum, c) => sum + CATEGORY_MAX_SCORES[c], 0);
    expect(total).toBe(100);
  });

  it('declares rules in a fixed order with unique ids', () => {
    const ids = CATEGORY_ORDER.flatMap(c => RULE_CATALOG[c].rules.map(r => r.id));
    expect(ids).toEqual([
      'ia_001', 'ia_002', 'ia_003', 'ia_004', 'ia_005',
      'cta_001', 'cta_002', 'cta_003', 'cta_004',
      'read_001', 'read_002', 'read_003', 'read_004', 'read_005', 'read_006',
      'form_001', 'form_002', 'form_003', 'form_004',
      'a11y_001', 'a11y_002', 'a11y_003', 'a11y_004',
      'perf_001', 'perf_002', 'perf_003',
    ]);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it('keeps every impact negative and within its category maximum', () => {
    for (const category of CATEGORY_ORDER) {
      const definition = RULE_CATALOG[category];
      expect(definition.maxScore).toBe(CATEGORY_MAX_SCORES[category]);
      for (const rule of definition.rules) {
        expect(rule.category).toBe(category);
        expect(rule.scoreImpact).toBeLessThan(0);
        expect(-rule.scoreImpact).toBeLessThanOrEqual(definition.maxScore);
      }
    }
  });
});

describe('evaluateCategory', () => {
  it('scores every category at its maximum when nothing fires', () => {
    const features = resolveFeatures(makeFeatures());
    for (const category of CATEGORY_ORDER) {
      const result = evaluateCategory(category, features);
      expect(result.score).toBe(CATEGORY_MAX_SCORES[category]);
      expect(result.maxScore).toBe(CATEGORY_MAX_SCORES[category]);
      expect(result.violations).toEqual([]);
    }
  });

  it('deducts a missing H1 and missing breadcrumbs in declaration order', () => {
    const map = makeFeatures({
      html: {
        heading_analysis: { has_h1: false },
        navigation_analysis: { has_breadcrumbs: false },
      },
    });
    const result = evaluateCategory('information_architecture', resolveFeatures(map));
    expect(result.score).toBe(23);
    expect(result.violations.map(v => v.ruleId)).toEqual(['ia_001', 'ia_004']);
  });

  it('does not floor information architecture when every rule fires', () => {
    const map = makeFeatures({
      html: {
        heading_analysis: { has_h1: false, multiple_h1: true, hierarchy_issues: ['Skipped from H1 to H3'] },
        navigation_analysis: { has_breadcrumbs: false, duplicate_link_texts: 6 },
      },
    });
    const result = evaluateCategory('information_architecture', resolveFeatures(map));
    expect(result.score).toBe(13);
    expect(result.violations).toHaveLength(5);
  });

  it('floors accessibility at zero when deductions exceed the maximum', () => {
    const map = makeFeatures({
      html: {
        accessibility_analysis: { alt_text_coverage: 0.5, aria_elements_count: 0, landmark_roles_count: 0 },
      },
      image: {
        contrast_analysis: { is_low_contrast: true },
      },
    });
    const result = evaluateCategory('accessibility', resolveFeatures(map));
    expect(result.score).toBe(0);
    expect(result.violations.map(v => v.ruleId)).toEqual(['a11y_001', 'a11y_002', 'a11y_003', 'a11y_004']);
  });

  it('skips form rules entirely when the page has no forms', () => {
    const map = makeFeatures({
      html: { form_analysis: { form_count: 0, unlabeled_count: 4, has_error_handling: false, input_count: 9 } },
      image: { element_detection: { button_candidates: 3, input_candidates: 0 } },
    });
    const result = evaluateCategory('form_ux', resolveFeatures(map));
    expect(result.score).toBe(15);
    expect(result.violations).toEqual([]);
  });

  it('reports the unlabeled field count in the form_001 description', () => {
    const map = makeFeatures({
      html: {
        form_analysis: { form_count: 1, unlabeled_count: 2, has_error_handling: true, required_fields: 1, input_count: 2 },
      },
    });
    const result = evaluateCategory('form_ux', resolveFeatures(map));
    expect(result.score).toBe(9);
    expect(result.violations).toHaveLength(1);
    expect(result.violations[0]).toEqual({
      ruleId: 'form_001',
      category: 'form_ux',
      description: '2 input field(s) have no label',
      severity: 'high',
      passed: false,
      scoreImpact: -6,
      recommendation: 'Give every input field a proper label.',
    });
  });

  it('flags unmarked required fields only when there are more than two inputs', () => {
    const base = { form_count: 1, has_error_handling: true, required_fields: 0 };
    const many = makeFeatures({ html: { form_analysis: { ...base, input_count: 4 } } });
    const few = makeFeatures({ html: { form_analysis: { ...base, input_count: 2 } } });
    expect(ruleIds('form_ux', many)).toEqual(['form_003']);
    expect(ruleIds('form_ux', few)).toEqual([]);
  });

  it('compares visual input candidates against half the input count', () => {
    const form = { form_count: 1, has_error_handling: true, required_fields: 1 };
    const hidden = makeFeatures({
      html: { form_analysis: { ...form, input_count: 6 } },
      image: { element_detection: { button_candidates: 3, input_candidates: 2 } },
    });
    const visible = makeFeatures({
      html: { form_analysis: { ...form, input_count: 4 } },
      image: { element_detection: { button_candidates: 3, input_candidates: 2 } },
    });
    expect(ruleIds('form_ux', hidden)).toEqual(['form_004']);
    expect(ruleIds('form_ux', visible)).toEqual([]);
  });

  it('fires either the empty title rule or the long title rule, never both', () => {
    const empty = makeFeatures({ html: { meta_analysis: { title_length: 0, description_length: 100 } } });
    const long = makeFeatures({ html: { meta_analysis: { title_length: 61, description_length: 100 } } });
    const limit = makeFeatures({ html: { meta_analysis: { title_length: 60, description_length: 100 } } });
    expect(ruleIds('readability', empty)).toEqual(['read_001']);
    expect(ruleIds('readability', long)).toEqual(['read_002']);
    expect(ruleIds('readability', limit)).toEqual([]);
  });

  it('uses strict thresholds for duplicate links, paragraphs and images', () => {
    const atLimit = makeFeatures({
      html: {
        navigation_analysis: { has_breadcrumbs: true, duplicate_link_texts: 5 },
        content_analysis: { avg_paragraph_length: 200 },
        accessibility_analysis: { alt_text_coverage: 0.8, aria_elements_count: 1, landmark_roles_count: 1, total_images: 10 },
      },
    });
    expect(ruleIds('information_architecture', atLimit)).toEqual([]);
    expect(ruleIds('readability', atLimit)).toEqual([]);
    expect(ruleIds('accessibility', atLimit)).toEqual([]);
    expect(ruleIds('performance', atLimit)).toEqual([]);
  });

  it('penalizes CTA visibility from the image signals', () => {
    const map = makeFeatures({
      image: {
        above_fold_analysis: { has_cta_above_fold: false },
        ocr_analysis: { button_texts: [] },
        contrast_analysis: { has_good_contrast: false },
        element_detection: { button_candidates: 1, input_candidates: 0 },
      },
    });
    const result = evaluateCategory('cta_visibility', resolveFeatures(map));
    expect(result.score).toBe(0);
    expect(result.violations.map(v => v.ruleId)).toEqual(['cta_001', 'cta_002', 'cta_003', 'cta_004']);
  });
});
