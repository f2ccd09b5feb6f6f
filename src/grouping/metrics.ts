// Metrics and audit trail for analysis runs

import type { ThresholdsSnapshot } from './config.js';
import type { PartitionViolationKind } from './errors.js';
import type { AnalysisTier, FurnitureGroup, GroupingMethod } from './types.js';

export interface RunMetrics {
  totals: {
    images: number;
    groups: number;
    multiImageGroups: number;
    singletons: number;
  };
  byTier: Record<AnalysisTier, number>;
  groupingMethod: GroupingMethod;
  violations: Record<PartitionViolationKind, number>;
  thresholds: ThresholdsSnapshot;
  timestamp: string;
  durationMs: number;
}

export function buildRunMetrics(opts: {
  groups: readonly FurnitureGroup[];
  tierByImage: Record<string, AnalysisTier>;
  groupingMethod: GroupingMethod;
  violations: ReadonlyArray<{ kind: PartitionViolationKind }>;
  thresholds: ThresholdsSnapshot;
  durationMs: number;
  now?: () => Date;
}): RunMetrics {
  const { groups, tierByImage, groupingMethod, violations, thresholds, durationMs } = opts;

  const byTier: Record<AnalysisTier, number> = { PRIMARY: 0, SECONDARY: 0, TERTIARY: 0 };
  for (const tier of Object.values(tierByImage)) byTier[tier]++;

  const counts: Record<PartitionViolationKind, number> = { 'unknown-id': 0, 'duplicate-id': 0, 'omitted-id': 0 };
  for (const v of violations) counts[v.kind]++;

  const multi = groups.filter((g) => g.members.length > 1).length;

  return {
    totals: {
      images: groups.reduce((sum, g) => sum + g.members.length, 0),
      groups: groups.length,
      multiImageGroups: multi,
      singletons: groups.length - multi,
    },
    byTier,
    groupingMethod,
    violations: counts,
    thresholds,
    timestamp: (opts.now ?? (() => new Date()))().toISOString(),
    durationMs,
  };
}

export function formatMetricsLog(m: RunMetrics): string {
  return `METRICS images=${m.totals.images} groups=${m.totals.groups} multi=${m.totals.multiImageGroups} singletons=${m.totals.singletons} primary=${m.byTier.PRIMARY} secondary=${m.byTier.SECONDARY} tertiary=${m.byTier.TERTIARY} grouping=${m.groupingMethod}`;
}
