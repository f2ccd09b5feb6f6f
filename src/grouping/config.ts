// Centralized configuration for grouping thresholds, boosts and template defaults
// Can be overridden via environment variables

import { ConfigurationError } from './errors.js';

export const ENGINE_VERSION = '1.0.0';

export const cfg = {
  // Heuristic merge gates (flagged for calibration)
  thresholds: {
    strong: parseFloat(process.env.GROUP_STRONG_SCORE || '0.7'),
    category: parseFloat(process.env.GROUP_CATEGORY_SCORE || '0.6'),
    furnitureType: parseFloat(process.env.GROUP_TYPE_SCORE || '0.5'),
  },

  // Additive similarity boosts
  boosts: {
    category: parseFloat(process.env.GROUP_CATEGORY_BOOST || '0.15'),
    color: parseFloat(process.env.GROUP_COLOR_BOOST || '0.10'),
  },

  // TERTIARY floor: used when no AI strategy produced anything for an image
  template: {
    titlePrefix: 'Quality Furniture Item',
    price: 150,
    condition: 'Good',
    confidence: 0.5,
    category: 'Furniture',
    description: 'Quality furniture in good condition. Perfect for your home!',
  },
};

export type Thresholds = typeof cfg.thresholds;
export type Boosts = typeof cfg.boosts;
export type TemplateDefaults = typeof cfg.template;

export function getThresholdsSnapshot() {
  return {
    engineVersion: ENGINE_VERSION,
    strongScore: cfg.thresholds.strong,
    categoryScore: cfg.thresholds.category,
    typeScore: cfg.thresholds.furnitureType,
    categoryBoost: cfg.boosts.category,
    colorBoost: cfg.boosts.color,
  };
}

export type ThresholdsSnapshot = ReturnType<typeof getThresholdsSnapshot>;

function inUnitRange(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Throws ConfigurationError when any threshold or boost is NaN or outside [0, 1].
 */
export function assertThresholds(thresholds: Thresholds = cfg.thresholds, boosts: Boosts = cfg.boosts): void {
  const entries: Array<[string, number]> = [
    ['thresholds.strong', thresholds.strong],
    ['thresholds.category', thresholds.category],
    ['thresholds.furnitureType', thresholds.furnitureType],
    ['boosts.category', boosts.category],
    ['boosts.color', boosts.color],
  ];
  const bad = entries.filter(([, value]) => !inUnitRange(value));
  if (bad.length) {
    throw new ConfigurationError(
      `Grouping thresholds must be within [0, 1]: ${bad.map(([k, v]) => `${k}=${v}`).join(', ')}`,
      { invalid: Object.fromEntries(bad) }
    );
  }
}

/**
 * Throws ConfigurationError when the TERTIARY template cannot produce a valid listing.
 */
export function assertTemplateDefaults(template: TemplateDefaults = cfg.template): void {
  const problems: string[] = [];
  if (!template.titlePrefix.trim()) problems.push('titlePrefix is empty');
  if (!template.category.trim()) problems.push('category is empty');
  if (!template.description.trim()) problems.push('description is empty');
  if (!Number.isFinite(template.price) || template.price <= 0) problems.push(`price ${template.price} is not positive`);
  if (!inUnitRange(template.confidence)) problems.push(`confidence ${template.confidence} outside [0, 1]`);
  if (problems.length) {
    throw new ConfigurationError(`Invalid template defaults: ${problems.join('; ')}`, { problems });
  }
}
