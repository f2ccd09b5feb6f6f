// src/grouping/template.ts
/**
 * TERTIARY floor: template attributes that need no AI call and cannot fail.
 */

import { assertTemplateDefaults, cfg, type TemplateDefaults } from './config.js';
import type { ImageAnalysis, UploadedImage } from './types.js';

/**
 * Template analysis for the image at `inputIndex` (0-based).
 * Titles are numbered from 1 in upload order.
 */
export function templateAnalysis(
  image: UploadedImage,
  inputIndex: number,
  defaults: TemplateDefaults = cfg.template
): ImageAnalysis {
  return Object.freeze({
    imageId: image.imageId,
    reference: image.reference,
    inputIndex,
    tier: 'TERTIARY' as const,
    category: defaults.category,
    subcategory: '',
    color: '',
    material: '',
    style: '',
    condition: defaults.condition,
    estimatedPrice: defaults.price,
    confidence: defaults.confidence,
    reasoning: 'AI analysis unavailable; template defaults applied',
    title: `${defaults.titlePrefix} ${inputIndex + 1}`,
    description: defaults.description,
  });
}

/**
 * Validate once, then build template analyses for every image.
 * Throws ConfigurationError when the defaults are unusable.
 */
export function createTemplateTier(defaults: TemplateDefaults = cfg.template) {
  assertTemplateDefaults(defaults);
  return {
    analyze(image: UploadedImage, inputIndex: number): ImageAnalysis {
      return templateAnalysis(image, inputIndex, defaults);
    },
  };
}
