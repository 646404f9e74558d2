import { z } from 'zod';

/**
 * Accessor table for every feature the rule catalog reads.
 *
 * Each key carries its type and the value used when the collaborator did not
 * provide it (or provided something of the wrong shape). Defaults are
 * optimistic: a missing signal never counts as a confirmed problem, except
 * where the absence itself is the problem (no H1, no title, no CTA found).
 */

const bool = (fallback: boolean) => z.boolean().catch(fallback);
const count = (fallback: number) => z.number().catch(fallback);
// Non-string entries are kept as text; rules read the length.
const strings = () =>
  z.array(z.unknown())
    .transform(items => items.map(item => (typeof item === 'string' ? item : String(item))))
    .catch(() => []);

function section<T extends z.ZodRawShape>(shape: T) {
  const schema = z.object(shape);
  return schema.catch(() => schema.parse({}));
}

const HtmlFeaturesSchema = z.object({
  heading_analysis: section({
    has_h1: bool(false),
    multiple_h1: bool(false),
    hierarchy_issues: strings(),
  }),
  navigation_analysis: section({
    has_breadcrumbs: bool(false),
    duplicate_link_texts: count(0),
  }),
  form_analysis: section({
    form_count: count(0),
    unlabeled_count: count(0),
    has_error_handling: bool(false),
    required_fields: count(0),
    input_count: count(1),
  }),
  accessibility_analysis: section({
    alt_text_coverage: count(1.0),
    aria_elements_count: count(0),
    landmark_roles_count: count(0),
    total_images: count(0),
  }),
  meta_analysis: section({
    title_length: count(0),
    description_length: count(0),
    structured_data_count: count(0),
    has_og_image: bool(false),
  }),
  content_analysis: section({
    avg_paragraph_length: count(0),
  }),
});

const ImageFeaturesSchema = z.object({
  above_fold_analysis: section({
    has_cta_above_fold: bool(false),
  }),
  ocr_analysis: section({
    button_texts: strings(),
  }),
  contrast_analysis: section({
    has_good_contrast: bool(true),
    is_low_contrast: bool(false),
  }),
  visual_density: section({
    is_cluttered: bool(false),
    has_sufficient_whitespace: bool(true),
  }),
  element_detection: section({
    button_candidates: count(0),
    input_candidates: count(0),
  }),
});

export const FeatureMapSchema = z.object({
  html: HtmlFeaturesSchema.catch(() => HtmlFeaturesSchema.parse({})),
  image: ImageFeaturesSchema.catch(() => ImageFeaturesSchema.parse({})),
});

export type Features = z.infer<typeof FeatureMapSchema>;
export type HtmlFeatures = Features['html'];
export type ImageFeatures = Features['image'];

type PartialSections<T> = { [K in keyof T]?: Partial<T[K]> };

/**
 * What the collaborators hand over. Every section and key is optional;
 * extra keys are allowed and ignored.
 */
export interface FeatureMap {
  html?: PartialSections<HtmlFeatures>;
  image?: PartialSections<ImageFeatures>;
}

/** Resolves a raw feature map against the accessor table. Never throws. */
export function resolveFeatures(featureMap: FeatureMap | unknown): Features {
  return FeatureMapSchema.catch(() => FeatureMapSchema.parse({})).parse(featureMap);
}
