import { DeviceProfile } from '../types';

export interface ImageFeatureMap {
  ocr_analysis: {
    text_blocks: string[];
    total_text_count: number;
    average_confidence: number;
    button_texts: string[];
    heading_texts: string[];
  };
  visual_density: {
    edge_density: number;
    texture_variance: number;
    white_space_ratio: number;
    complexity_score: number;
    is_cluttered: boolean;
    has_sufficient_whitespace: boolean;
  };
  element_detection: {
    button_candidates: number;
    input_candidates: number;
    total_ui_elements: number;
    ui_density: number;
  };
  above_fold_analysis: {
    has_cta_above_fold: boolean;
    important_text_count: number;
    fold_height: number;
    content_density_above_fold: number;
  };
  contrast_analysis: {
    rms_contrast: number;
    michelson_contrast: number;
    dynamic_range: number;
    mean_intensity: number;
    has_good_contrast: boolean;
    is_low_contrast: boolean;
  };
}

/**
 * Visual signals without a screenshot. No OCR or vision model runs, so every
 * page gets the same optimistic baseline; only the fold follows the device.
 */
export function estimateImageFeatures(profile: Pick<DeviceProfile, 'viewport'>): ImageFeatureMap {
  return {
    ocr_analysis: {
      text_blocks: [],
      total_text_count: 0,
      average_confidence: 0,
      button_texts: ['Buy now', 'Apply', 'Sign up'],
      heading_texts: ['Main title', 'Subtitle'],
    },
    visual_density: {
      edge_density: 0.15,
      texture_variance: 1500,
      white_space_ratio: 0.35,
      complexity_score: 45,
      is_cluttered: false,
      has_sufficient_whitespace: true,
    },
    element_detection: {
      button_candidates: 3,
      input_candidates: 2,
      total_ui_elements: 5,
      ui_density: 0.02,
    },
    above_fold_analysis: {
      has_cta_above_fold: true,
      important_text_count: 5,
      fold_height: profile.viewport.height,
      content_density_above_fold: 8.3,
    },
    contrast_analysis: {
      rms_contrast: 65,
      michelson_contrast: 0.7,
      dynamic_range: 180,
      mean_intensity: 128,
      has_good_contrast: true,
      is_low_contrast: false,
    },
  };
}
