// src/grouping/grouping.ts
/**
 * Grouping engine: partitions analyzed images into furniture items.
 *
 * Two paths:
 *  - AI: one holistic call over every analysis, reconciled into a strict partition
 *  - heuristic: greedy clustering on text similarity, optionally seeded with
 *    groups that already exist
 *
 * Both always return a strict partition of the input and never mutate it.
 */

import { cfg, type Boosts, type Thresholds } from './config.js';
import {
  classifyProviderError,
  PartitionViolationError,
  ProviderUnavailableError,
  type AnalysisError,
} from './errors.js';
import { canonicalPhrase, furnitureType, sameCategory, sameFurnitureType, score } from './similarity.js';
import { getSynonymTable, type SynonymTable } from './synonyms.js';
import type {
  FurnitureGroup,
  GroupingMethod,
  HolisticGroup,
  HolisticGrouper,
  ImageAnalysis,
} from './types.js';
import { consoleLogger, type Logger } from '../lib/request-logger.js';

export interface DraftGroup {
  members: ImageAnalysis[];
  method: GroupingMethod;
  reasoning: string;
  confidence: number;
}

export interface HeuristicOptions {
  /** Groups already formed; new images may join them */
  seeds?: readonly FurnitureGroup[];
  table?: SynonymTable;
  thresholds?: Thresholds;
  boosts?: Boosts;
}

export interface GroupingOptions extends HeuristicOptions {
  grouper?: HolisticGrouper;
  logger?: Logger;
}

export interface GroupingResult {
  groups: FurnitureGroup[];
  method: GroupingMethod;
  violations: PartitionViolationError[];
  /** Set when the AI path was wanted but failed or was unavailable */
  error?: AnalysisError;
}

const round2 = (n: number) => Math.round(n * 100) / 100;

function byInputIndex(a: ImageAnalysis, b: ImageAnalysis): number {
  return a.inputIndex - b.inputIndex;
}

function isUnknown(value: string): boolean {
  const v = value.trim().toLowerCase();
  return v === '' || v === 'unknown' || v === 'n/a' || v === 'none';
}

/**
 * Title for an item: the AI title, else "color style type", else "Quality Furniture".
 */
export function composeTitle(analysis: ImageAnalysis): string {
  if (analysis.title && analysis.title.trim()) return analysis.title.trim();
  const kind = !isUnknown(analysis.subcategory) ? analysis.subcategory : analysis.category;
  const parts = [analysis.color, analysis.style, kind].map((p) => p.trim()).filter((p) => !isUnknown(p));
  if (!parts.length) return 'Quality Furniture';
  return parts.map((p) => p.charAt(0).toUpperCase() + p.slice(1)).join(' ');
}

/**
 * Highest confidence member; ties go to the earliest input.
 */
export function pickRepresentative(members: readonly ImageAnalysis[]): ImageAnalysis {
  let best = members[0];
  for (const m of members) {
    if (m.confidence > best.confidence || (m.confidence === best.confidence && m.inputIndex < best.inputIndex)) {
      best = m;
    }
  }
  return best;
}

/**
 * Majority vote over canonical values. Ties go to the representative's value,
 * then to the earliest member. Returns the raw value of the winning member.
 */
function vote(
  members: readonly ImageAnalysis[],
  representative: ImageAnalysis,
  pick: (a: ImageAnalysis) => string,
  table: SynonymTable
): string {
  const counts = new Map<string, number>();
  for (const m of members) {
    const key = canonicalPhrase(pick(m), table);
    if (key) counts.set(key, (counts.get(key) || 0) + 1);
  }
  if (!counts.size) return pick(representative);

  const top = Math.max(...counts.values());
  const repKey = canonicalPhrase(pick(representative), table);
  if (counts.get(repKey) === top) return pick(representative);

  for (const m of members) {
    if (counts.get(canonicalPhrase(pick(m), table)) === top) return pick(m);
  }
  return pick(representative);
}

/**
 * Order drafts by their earliest member, members by input index, and assign
 * ids group_1..group_n.
 */
export function finalizeGroups(drafts: readonly DraftGroup[], table: SynonymTable = getSynonymTable()): FurnitureGroup[] {
  return drafts
    .filter((d) => d.members.length > 0)
    .map((d) => ({ ...d, members: d.members.slice().sort(byInputIndex) }))
    .sort((a, b) => a.members[0].inputIndex - b.members[0].inputIndex)
    .map((d, i) => {
      const representative = pickRepresentative(d.members);
      return {
        groupId: `group_${i + 1}`,
        imageIds: d.members.map((m) => m.imageId),
        members: d.members,
        representative,
        title: composeTitle(representative),
        category: vote(d.members, representative, (m) => m.category, table),
        color: vote(d.members, representative, (m) => m.color, table),
        method: d.method,
        reasoning: d.reasoning,
        confidence: d.confidence,
      };
    });
}

/**
 * Turn an AI grouping answer into a strict partition.
 * Unknown ids are dropped, the first group to list an id keeps it, empty groups
 * vanish and omitted images become singletons in input order.
 */
export function reconcilePartition(
  analyses: readonly ImageAnalysis[],
  answer: readonly HolisticGroup[]
): { drafts: DraftGroup[]; violations: PartitionViolationError[] } {
  const byId = new Map(analyses.map((a) => [a.imageId, a]));
  const placed = new Set<string>();
  const violations: PartitionViolationError[] = [];
  const drafts: DraftGroup[] = [];

  for (const group of answer) {
    const members: ImageAnalysis[] = [];
    for (const id of group.imageIds) {
      const analysis = byId.get(id);
      if (!analysis) {
        violations.push(new PartitionViolationError('unknown-id', id));
        continue;
      }
      if (placed.has(id)) {
        violations.push(new PartitionViolationError('duplicate-id', id));
        continue;
      }
      placed.add(id);
      members.push(analysis);
    }
    if (members.length) {
      drafts.push({ members, method: 'ai', reasoning: group.reasoning, confidence: group.confidence });
    }
  }

  for (const analysis of analyses) {
    if (placed.has(analysis.imageId)) continue;
    violations.push(new PartitionViolationError('omitted-id', analysis.imageId));
    placed.add(analysis.imageId);
    drafts.push({
      members: [analysis],
      method: 'ai',
      reasoning: 'Not placed by AI grouping; kept as its own item',
      confidence: analysis.confidence,
    });
  }

  return { drafts, violations };
}

/**
 * Greedy clustering in input order. Each image joins the best qualifying group
 * (compared against the group's first member) or starts a new one.
 */
export function groupHeuristically(
  analyses: readonly ImageAnalysis[],
  options: HeuristicOptions = {}
): FurnitureGroup[] {
  const table = options.table ?? getSynonymTable();
  const thresholds = options.thresholds ?? cfg.thresholds;
  const boosts = options.boosts ?? cfg.boosts;

  const seeded = new Set<string>();
  const drafts: DraftGroup[] = (options.seeds ?? []).map((g) => {
    g.members.forEach((m) => seeded.add(m.imageId));
    return { members: g.members.slice(), method: g.method, reasoning: g.reasoning, confidence: g.confidence };
  });

  const pending = analyses.filter((a) => !seeded.has(a.imageId)).sort(byInputIndex);

  for (const analysis of pending) {
    let best: { draft: DraftGroup; score: number } | null = null;

    for (const draft of drafts) {
      const head = draft.members[0];
      const s = score(analysis, head, table, boosts);
      const qualifies =
        s >= thresholds.strong ||
        (s >= thresholds.category && sameCategory(analysis, head, table)) ||
        (s >= thresholds.furnitureType && sameFurnitureType(analysis, head, table));
      if (qualifies && (!best || s > best.score)) {
        best = { draft, score: s };
      }
    }

    if (best) {
      best.draft.members.push(analysis);
      best.draft.confidence = round2(Math.min(best.draft.confidence, best.score));
      if (best.draft.method === 'heuristic') {
        best.draft.reasoning = `Grouped by text similarity (lowest match ${best.draft.confidence})`;
      }
    } else {
      const type = furnitureType(analysis, table);
      drafts.push({
        members: [analysis],
        method: 'heuristic',
        reasoning: type ? `No similar ${type} found` : 'No similar item found',
        confidence: 1,
      });
    }
  }

  return finalizeGroups(drafts, table);
}

/**
 * One group per image. Used by the template tier.
 */
export function singletonGroups(
  analyses: readonly ImageAnalysis[],
  method: GroupingMethod = 'template',
  table: SynonymTable = getSynonymTable()
): FurnitureGroup[] {
  return finalizeGroups(
    analyses.map((a) => ({
      members: [a],
      method,
      reasoning: method === 'template' ? 'Template defaults; not grouped' : 'Single image',
      confidence: a.confidence,
    })),
    table
  );
}

/**
 * Partition analyses: AI grouping when a grouper is available and answers,
 * heuristic grouping otherwise.
 */
export async function groupAnalyses(
  analyses: readonly ImageAnalysis[],
  options: GroupingOptions = {}
): Promise<GroupingResult> {
  const log = options.logger ?? consoleLogger('grouping');
  const table = options.table ?? getSynonymTable();
  const { grouper } = options;

  if (!analyses.length) {
    return { groups: finalizeGroups(options.seeds ?? [], table), method: 'heuristic', violations: [] };
  }

  if (!grouper) {
    return { groups: groupHeuristically(analyses, options), method: 'heuristic', violations: [] };
  }

  if (!grouper.available()) {
    log.warn('AI grouping unavailable, using heuristic grouping');
    return {
      groups: groupHeuristically(analyses, options),
      method: 'heuristic',
      violations: [],
      error: new ProviderUnavailableError('Holistic grouper unavailable'),
    };
  }

  try {
    const answer = await grouper.groupHolistically(analyses);
    const { drafts, violations } = reconcilePartition(analyses, answer);
    for (const v of violations) {
      log.warn(`Partition corrected: ${v.kind} ${v.imageId}`);
    }
    const groups = finalizeGroups(drafts, table);
    log.info(`AI grouping: ${analyses.length} images → ${groups.length} groups (${violations.length} corrections)`);
    return { groups, method: 'ai', violations };
  } catch (err) {
    const error = classifyProviderError(err);
    log.warn(`AI grouping failed (${error.code}): ${error.message}; using heuristic grouping`);
    return { groups: groupHeuristically(analyses, options), method: 'heuristic', violations: [], error };
  }
}
