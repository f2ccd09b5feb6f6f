// Zod schemas for everything the vision/LLM providers send back.
// parse* helpers throw ZodError on invalid input; callers classify it as malformed.

import { z } from 'zod';
import type { HolisticGroup, VisionAttributes } from './types.js';

const clamp01 = (n: number) => Math.min(1, Math.max(0, n));

const Text = z
  .string()
  .nullish()
  .transform((s) => (s ?? '').trim());

const OptionalText = z
  .string()
  .nullish()
  .transform((s) => {
    const t = (s ?? '').trim();
    return t ? t : null;
  });

const NumericString = z
  .string()
  .trim()
  .regex(/^-?\d+(?:\.\d+)?$/)
  .transform(Number);

// "0.8" is accepted as well as 0.8
const Confidence = z.union([z.number(), NumericString]).pipe(z.number().finite()).transform(clamp01);

const PRICE_RANGE = /(\d+(?:\.\d+)?)\s*(?:-|\u2013|to)\s*\$?\s*(\d+(?:\.\d+)?)/i;
const PRICE_NUMBER = /\d+(?:\.\d+)?/;

/**
 * Price from free text: "$150" → 150, "1,200" → 1200, "$150-$200" → 175.
 * Returns NaN when there is no number.
 */
export function parsePriceText(text: string): number {
  const plain = text.replace(/(\d),(?=\d{3}\b)/g, '$1');
  const range = PRICE_RANGE.exec(plain);
  if (range) {
    return Math.round(((parseFloat(range[1]) + parseFloat(range[2])) / 2) * 100) / 100;
  }
  const first = PRICE_NUMBER.exec(plain);
  return first ? parseFloat(first[0]) : NaN;
}

// Models sometimes answer "$150" or "150.00" instead of a number
const Price = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v) => {
    if (v === null || v === undefined) return null;
    const n = typeof v === 'number' ? v : parsePriceText(v);
    return Number.isFinite(n) && n > 0 ? n : null;
  });

export const VisionAttributesSchema = z.object({
  category: Text,
  subcategory: Text,
  color: Text,
  material: Text,
  style: Text,
  condition: Text,
  estimatedPrice: Price,
  confidence: Confidence.default(0.5),
  reasoning: Text,
  title: OptionalText,
  description: OptionalText,
});

export function parseVisionAttributes(input: unknown): VisionAttributes {
  return VisionAttributesSchema.parse(input);
}

// Empty groups and unknown ids are corrected by reconcilePartition, not rejected here
const HolisticGroupSchema = z.object({
  imageIds: z.array(z.string()),
  reasoning: Text,
  confidence: Confidence.default(0.5),
});

const HolisticGroupingSchema = z.object({
  groups: z.array(HolisticGroupSchema),
});

export function parseHolisticGrouping(input: unknown): HolisticGroup[] {
  return HolisticGroupingSchema.parse(input).groups;
}

// Multi-agent answers: each agent covers a slice of VisionAttributes

export const CategoryAgentSchema = z.object({
  category: z.string().min(1),
  subcategory: Text,
  confidence: Confidence.default(0.5),
  reasoning: Text,
});

export const ColorAgentSchema = z.object({
  color: z.string().min(1),
  confidence: Confidence.default(0.5),
});

export const StyleAgentSchema = z.object({
  style: Text,
  material: Text,
  condition: Text,
  confidence: Confidence.default(0.5),
});

export const PricingAgentSchema = z.object({
  estimatedPrice: Price,
  title: OptionalText,
  description: OptionalText,
  confidence: Confidence.default(0.5),
});

export type CategoryAgentResult = z.infer<typeof CategoryAgentSchema>;
export type ColorAgentResult = z.infer<typeof ColorAgentSchema>;
export type StyleAgentResult = z.infer<typeof StyleAgentSchema>;
export type PricingAgentResult = z.infer<typeof PricingAgentSchema>;
