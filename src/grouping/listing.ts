// src/grouping/listing.ts
/**
 * Listing assembler: one marketplace listing per furniture group.
 */

import { furnitureType } from './similarity.js';
import { getSynonymTable, type SynonymTable } from './synonyms.js';
import type { FurnitureGroup, ImageAnalysis, Listing } from './types.js';

export const CONDITION_OPTIONS = ['New', 'Like New', 'Good', 'Fair', 'Poor'] as const;

const MARKETPLACE_CONDITIONS: Record<string, string> = {
  'new': 'New',
  'like new': 'Used - Like New',
  'excellent': 'Used - Like New',
  'very good': 'Used - Like New',
  'good': 'Used - Good',
  'fair': 'Used - Fair',
  'poor': 'Used - Fair',
};

const BASE_PRICES: Record<string, number> = {
  chair: 75,
  table: 120,
  sofa: 300,
  bed: 250,
  desk: 100,
  cabinet: 150,
  bookshelf: 80,
  dresser: 180,
};
const DEFAULT_BASE_PRICE = 100;

const ROOT_CATEGORY = 'Home & Garden//Furniture';

const SECTIONS: Record<string, string> = {
  chair: 'Chairs & Seating',
  table: 'Tables',
  sofa: 'Living Room Furniture',
  bed: 'Bedroom Furniture',
  dresser: 'Bedroom Furniture',
  desk: 'Office Furniture',
  cabinet: 'Storage & Organization',
  bookshelf: 'Storage & Organization',
};

export interface AssembleOptions {
  now?: () => Date;
  idPrefix?: string;
  table?: SynonymTable;
}

export function mapCondition(condition: string): string {
  return MARKETPLACE_CONDITIONS[condition.trim().toLowerCase()] ?? 'Used - Good';
}

export function basePrice(type: string | null): number {
  return (type && BASE_PRICES[type]) || DEFAULT_BASE_PRICE;
}

export function marketplaceCategory(type: string | null): string {
  const section = type ? SECTIONS[type] : undefined;
  return section ? `${ROOT_CATEGORY}//${section}` : ROOT_CATEGORY;
}

function validPrice(p: number | null): p is number {
  return p !== null && Number.isFinite(p) && p > 0;
}

function median(values: number[]): number {
  const sorted = values.slice().sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

const round2 = (n: number) => Math.round(n * 100) / 100;

function groupType(group: FurnitureGroup, table: SynonymTable): string | null {
  const fromRep = furnitureType(group.representative, table);
  if (fromRep) return fromRep;
  for (const m of group.members) {
    const t = furnitureType(m, table);
    if (t) return t;
  }
  return null;
}

export function priceFor(group: FurnitureGroup, type: string | null): number {
  if (validPrice(group.representative.estimatedPrice)) return round2(group.representative.estimatedPrice);
  const prices = group.members.map((m) => m.estimatedPrice).filter(validPrice);
  if (prices.length) return round2(median(prices));
  return basePrice(type);
}

function describe(rep: ImageAnalysis, type: string | null): string {
  if (rep.description && rep.description.trim()) return rep.description.trim();

  const lead = [rep.style, rep.material].map((s) => s.trim()).filter((s) => s && s.toLowerCase() !== 'unknown');
  const noun = type ?? 'furniture piece';
  const head = lead.length ? `${lead.join(' ')} ${noun}` : noun;
  const color = rep.color.trim() && rep.color.toLowerCase() !== 'unknown' ? ` in ${rep.color.trim().toLowerCase()}` : '';
  const condition = rep.condition.trim() ? `${rep.condition.trim().toLowerCase()} condition` : 'good condition';
  const sentence = `${head}${color}, ${condition}.`;
  return `${sentence.charAt(0).toUpperCase()}${sentence.slice(1)} Perfect for your home!`;
}

/**
 * One listing per group, in group order. No group is dropped.
 */
export function assembleListings(groups: readonly FurnitureGroup[], options: AssembleOptions = {}): Listing[] {
  const now = options.now ?? (() => new Date());
  const prefix = options.idPrefix ?? 'listing';
  const table = options.table ?? getSynonymTable();
  const createdAt = now().toISOString();

  return groups.map((group, i) => {
    const rep = group.representative;
    const type = groupType(group, table);
    const confidence = group.members.reduce((sum, m) => sum + m.confidence, 0) / group.members.length;

    return Object.freeze({
      listingId: `${prefix}_${i + 1}`,
      groupId: group.groupId,
      title: group.title,
      price: priceFor(group, type),
      condition: mapCondition(rep.condition),
      description: describe(rep, type),
      category: group.category,
      marketplaceCategory: marketplaceCategory(type),
      images: group.members.map((m) => ({ imageId: m.imageId, reference: m.reference, tier: m.tier })),
      confidence: round2(confidence),
      analysisMethod: rep.tier,
      createdAt,
    });
  });
}
