// src/grouping/similarity.ts
/**
 * Text similarity between two analyzed images.
 *
 * Pure and deterministic. No price or condition signal: only what the item is,
 * its color and its style.
 */

import { cfg, type Boosts } from './config.js';
import { getSynonymTable, normalizeWords, type SynonymTable } from './synonyms.js';

export const STOP_WORDS: ReadonlySet<string> = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by', 'from',
]);

export interface SimilarityInput {
  title?: string | null;
  category?: string | null;
  subcategory?: string | null;
  color?: string | null;
  style?: string | null;
}

function significant(word: string): boolean {
  return word.length > 1 && !STOP_WORDS.has(word);
}

/**
 * Canonical tokens of a free-text value, stop words and 1-char tokens removed.
 */
export function canonicalTokens(text: string | null | undefined, table: SynonymTable = getSynonymTable()): string[] {
  return table.canonicalize(normalizeWords(text)).filter(significant);
}

/**
 * Canonical form of a single attribute ("Off-White" → "white"); '' when nothing is left.
 */
export function canonicalPhrase(value: string | null | undefined, table: SynonymTable = getSynonymTable()): string {
  return canonicalTokens(value, table).join(' ');
}

/**
 * Token set over title, category, color and style.
 */
export function tokenSet(item: SimilarityInput, table: SynonymTable = getSynonymTable()): Set<string> {
  const text = [item.title, item.category, item.color, item.style].filter(Boolean).join(' ');
  return new Set(canonicalTokens(text, table));
}

/**
 * Canonical furniture type: the subcategory when it is exactly one furniture
 * term, otherwise the first furniture term in title, category, subcategory.
 */
export function furnitureType(item: SimilarityInput, table: SynonymTable = getSynonymTable()): string | null {
  const sub = canonicalPhrase(item.subcategory, table);
  if (table.isFurnitureType(sub)) return sub;

  for (const field of [item.title, item.category, item.subcategory]) {
    const found = canonicalTokens(field, table).find((t) => table.isFurnitureType(t));
    if (found) return found;
  }
  return null;
}

export function sameCategory(a: SimilarityInput, b: SimilarityInput, table: SynonymTable = getSynonymTable()): boolean {
  const ca = canonicalPhrase(a.category, table);
  return ca !== '' && ca === canonicalPhrase(b.category, table);
}

export function sameColor(a: SimilarityInput, b: SimilarityInput, table: SynonymTable = getSynonymTable()): boolean {
  const ca = canonicalPhrase(a.color, table);
  return ca !== '' && ca === canonicalPhrase(b.color, table);
}

export function sameFurnitureType(a: SimilarityInput, b: SimilarityInput, table: SynonymTable = getSynonymTable()): boolean {
  const ta = furnitureType(a, table);
  return ta !== null && ta === furnitureType(b, table);
}

/**
 * Jaccard similarity of two token sets; 0 when either is empty.
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let inter = 0;
  for (const t of a) if (b.has(t)) inter++;
  return inter / (a.size + b.size - inter);
}

/**
 * Similarity in [0, 1]: Jaccard over canonical tokens plus category and color boosts.
 */
export function score(
  a: SimilarityInput,
  b: SimilarityInput,
  table: SynonymTable = getSynonymTable(),
  boosts: Boosts = cfg.boosts
): number {
  const base = jaccard(tokenSet(a, table), tokenSet(b, table));
  if (base === 0) return 0;
  let total = base;
  if (sameCategory(a, b, table)) total += boosts.category;
  if (sameColor(a, b, table)) total += boosts.color;
  // Round away float noise before threshold comparisons
  return Math.min(1, Math.round(total * 10000) / 10000);
}
