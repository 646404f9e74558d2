import { Category, Severity, CATEGORY_MAX_SCORES } from '../types';
import { Features } from './features';

export interface RuleDefinition {
  readonly id: string;
  readonly category: Category;
  readonly severity: Severity;
  readonly scoreImpact: number;
  readonly description: string | ((features: Features) => string);
  readonly recommendation: string;
  readonly triggered: (features: Features) => boolean;
}

export interface CategoryDefinition {
  readonly category: Category;
  readonly maxScore: number;
  // When present and false, the category keeps its full score and fires nothing.
  readonly applies?: (features: Features) => boolean;
  readonly rules: readonly RuleDefinition[];
}

const informationArchitecture: CategoryDefinition = {
  category: 'information_architecture',
  maxScore: CATEGORY_MAX_SCORES.information_architecture,
  rules: [
    {
      id: 'ia_001',
      category: 'information_architecture',
      severity: 'high',
      scoreImpact: -5,
      description: 'The page has no H1 heading',
      recommendation: 'Give the page a clear, descriptive H1 heading.',
      triggered: f => !f.html.heading_analysis.has_h1,
    },
    {
      id: 'ia_002',
      category: 'information_architecture',
      severity: 'medium',
      scoreImpact: -3,
      description: 'The page has more than one H1 heading',
      recommendation: 'Keep a single H1 heading per page.',
      triggered: f => f.html.heading_analysis.multiple_h1,
    },
    {
      id: 'ia_003',
      category: 'information_architecture',
      severity: 'medium',
      scoreImpact: -4,
      description: 'The heading hierarchy skips levels or does not start at H1',
      recommendation: 'Structure headings in order (H1 → H2 → H3) without skipping levels.',
      triggered: f => f.html.heading_analysis.hierarchy_issues.length > 0,
    },
    {
      id: 'ia_004',
      category: 'information_architecture',
      severity: 'low',
      scoreImpact: -2,
      description: 'No breadcrumb navigation was found',
      recommendation: 'Add breadcrumb navigation so visitors can see where they are.',
      triggered: f => !f.html.navigation_analysis.has_breadcrumbs,
    },
    {
      id: 'ia_005',
      category: 'information_architecture',
      severity: 'medium',
      scoreImpact: -3,
      description: 'Too many links share the same text',
      recommendation: 'Consolidate links with identical text and make each link label distinct.',
      triggered: f => f.html.navigation_analysis.duplicate_link_texts > 5,
    },
  ],
};

const ctaVisibility: CategoryDefinition = {
  category: 'cta_visibility',
  maxScore: CATEGORY_MAX_SCORES.cta_visibility,
  rules: [
    {
      id: 'cta_001',
      category: 'cta_visibility',
      severity: 'high',
      scoreImpact: -8,
      description: 'No call to action was found above the fold',
      recommendation: 'Place the primary call to action in the area visible without scrolling.',
      triggered: f => !f.image.above_fold_analysis.has_cta_above_fold,
    },
    {
      id: 'cta_002',
      category: 'cta_visibility',
      severity: 'medium',
      scoreImpact: -5,
      description: 'No clear button text was detected',
      recommendation: 'Use buttons whose labels state the action, such as "Buy", "Apply" or "Sign up".',
      triggered: f => f.image.ocr_analysis.button_texts.length === 0,
    },
    {
      id: 'cta_003',
      category: 'cta_visibility',
      severity: 'medium',
      scoreImpact: -4,
      description: 'Overall contrast is insufficient',
      recommendation: 'Raise the contrast of buttons and other key elements.',
      triggered: f => !f.image.contrast_analysis.has_good_contrast,
    },
    {
      id: 'cta_004',
      category: 'cta_visibility',
      severity: 'low',
      scoreImpact: -3,
      description: 'Few visually identifiable buttons',
      recommendation: 'Make buttons stand out visually from the surrounding content.',
      triggered: f => f.image.element_detection.button_candidates < 2,
    },
  ],
};

const readability: CategoryDefinition = {
  category: 'readability',
  maxScore: CATEGORY_MAX_SCORES.readability,
  rules: [
    {
      id: 'read_001',
      category: 'readability',
      severity: 'high',
      scoreImpact: -5,
      description: 'The page title is not set',
      recommendation: 'Set a descriptive page title.',
      triggered: f => f.html.meta_analysis.title_length === 0,
    },
    {
      id: 'read_002',
      category: 'readability',
      severity: 'low',
      scoreImpact: -2,
      description: 'The page title is too long',
      recommendation: 'Keep the page title within 60 characters.',
      triggered: f => f.html.meta_analysis.title_length > 60,
    },
    {
      id: 'read_003',
      category: 'readability',
      severity: 'medium',
      scoreImpact: -3,
      description: 'The meta description is not set',
      recommendation: 'Add a meta description to show in search results.',
      triggered: f => f.html.meta_analysis.description_length === 0,
    },
    {
      id: 'read_004',
      category: 'readability',
      severity: 'low',
      scoreImpact: -2,
      description: 'Paragraphs are too long',
      recommendation: 'Split paragraphs into shorter, easier-to-read blocks.',
      triggered: f => f.html.content_analysis.avg_paragraph_length > 200,
    },
    {
      id: 'read_005',
      category: 'readability',
      severity: 'medium',
      scoreImpact: -4,
      description: 'The page is visually too dense',
      recommendation: 'Add spacing between elements and reduce visual clutter.',
      triggered: f => f.image.visual_density.is_cluttered,
    },
    {
      id: 'read_006',
      category: 'readability',
      severity: 'medium',
      scoreImpact: -4,
      description: 'There is not enough whitespace',
      recommendation: 'Leave more whitespace between elements to improve legibility.',
      triggered: f => !f.image.visual_density.has_sufficient_whitespace,
    },
  ],
};

const formUx: CategoryDefinition = {
  category: 'form_ux',
  maxScore: CATEGORY_MAX_SCORES.form_ux,
  applies: f => f.html.form_analysis.form_count > 0,
  rules: [
    {
      id: 'form_001',
      category: 'form_ux',
      severity: 'high',
      scoreImpact: -6,
      description: f => `${f.html.form_analysis.unlabeled_count} input field(s) have no label`,
      recommendation: 'Give every input field a proper label.',
      triggered: f => f.html.form_analysis.unlabeled_count > 0,
    },
    {
      id: 'form_002',
      category: 'form_ux',
      severity: 'medium',
      scoreImpact: -4,
      description: 'No mechanism for showing error messages was found',
      recommendation: 'Show clear error messages when input is invalid.',
      triggered: f => !f.html.form_analysis.has_error_handling,
    },
    {
      id: 'form_003',
      category: 'form_ux',
      severity: 'low',
      scoreImpact: -2,
      description: 'Required fields are not marked',
      recommendation: 'Mark required fields clearly (an asterisk or the required attribute).',
      triggered: f => f.html.form_analysis.required_fields === 0 && f.html.form_analysis.input_count > 2,
    },
    {
      id: 'form_004',
      category: 'form_ux',
      severity: 'low',
      scoreImpact: -3,
      description: 'Input fields may be hard to identify visually',
      recommendation: 'Give input fields a visible border or background.',
      triggered: f => f.image.element_detection.input_candidates < f.html.form_analysis.input_count * 0.5,
    },
  ],
};

const accessibility: CategoryDefinition = {
  category: 'accessibility',
  maxScore: CATEGORY_MAX_SCORES.accessibility,
  rules: [
    {
      id: 'a11y_001',
      category: 'accessibility',
      severity: 'medium',
      scoreImpact: -4,
      description: 'Images are missing alt text',
      recommendation: 'Provide meaningful alt text for every image.',
      triggered: f => f.html.accessibility_analysis.alt_text_coverage < 0.8,
    },
    {
      id: 'a11y_002',
      category: 'accessibility',
      severity: 'low',
      scoreImpact: -2,
      description: 'No ARIA attributes are used',
      recommendation: 'Use ARIA attributes to support screen readers.',
      triggered: f => f.html.accessibility_analysis.aria_elements_count === 0,
    },
    {
      id: 'a11y_003',
      category: 'accessibility',
      severity: 'low',
      scoreImpact: -2,
      description: 'No landmark roles are set',
      recommendation: 'Set landmark roles such as main, navigation and banner.',
      triggered: f => f.html.accessibility_analysis.landmark_roles_count === 0,
    },
    {
      id: 'a11y_004',
      category: 'accessibility',
      severity: 'medium',
      scoreImpact: -4,
      description: 'The contrast ratio is insufficient',
      recommendation: 'Meet the WCAG contrast ratio of at least 4.5:1.',
      triggered: f => f.image.contrast_analysis.is_low_contrast,
    },
  ],
};

const performance: CategoryDefinition = {
  category: 'performance',
  maxScore: CATEGORY_MAX_SCORES.performance,
  rules: [
    {
      id: 'perf_001',
      category: 'performance',
      severity: 'low',
      scoreImpact: -1,
      description: 'No structured data is present',
      recommendation: 'Add structured data in JSON-LD format.',
      triggered: f => f.html.meta_analysis.structured_data_count === 0,
    },
    {
      id: 'perf_002',
      category: 'performance',
      severity: 'low',
      scoreImpact: -2,
      description: 'The page has many images, which may slow loading',
      recommendation: 'Optimize images (compression, WebP format).',
      triggered: f => f.html.accessibility_analysis.total_images > 10,
    },
    {
      id: 'perf_003',
      category: 'performance',
      severity: 'low',
      scoreImpact: -1,
      description: 'No social preview (og:image) is set',
      recommendation: 'Set an og:image for link previews on social networks.',
      triggered: f => !f.html.meta_analysis.has_og_image,
    },
  ],
};

export const RULE_CATALOG: Readonly<Record<Category, CategoryDefinition>> = {
  information_architecture: informationArchitecture,
  cta_visibility: ctaVisibility,
  readability,
  form_ux: formUx,
  accessibility,
  performance,
};
