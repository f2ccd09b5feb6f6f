// src/grouping/orchestrator.ts
/**
 * Fallback orchestrator: drives one upload batch through
 * PRIMARY → SECONDARY → TERTIARY and returns listings covering every image.
 *
 * Only the images a tier failed to analyze move on to the next tier. TERTIARY
 * (template defaults) cannot fail, so every request completes.
 */

import { randomUUID } from 'crypto';
import { assertThresholds, cfg, getThresholdsSnapshot, type Boosts, type TemplateDefaults, type Thresholds } from './config.js';
import {
  classifyProviderError,
  InvalidRequestError,
  ProviderUnavailableError,
  TransientProviderError,
  type AnalysisError,
  type PartitionViolationError,
} from './errors.js';
import { finalizeGroups, groupAnalyses, groupHeuristically, singletonGroups } from './grouping.js';
import { assembleListings } from './listing.js';
import { buildRunMetrics, formatMetricsLog, type RunMetrics } from './metrics.js';
import { parseVisionAttributes } from './schema.js';
import { getSynonymTable, type SynonymTable } from './synonyms.js';
import { createTemplateTier } from './template.js';
import type {
  AnalysisRequest,
  AnalysisTier,
  FurnitureGroup,
  GroupingMethod,
  HolisticGrouper,
  ImageAnalysis,
  Listing,
  TierStrategy,
  UploadedImage,
} from './types.js';
import { mapLimit, sleep, withTimeout } from '../lib/concurrency.js';
import { createRequestLogger, type LogEntry, type RequestLogger } from '../lib/request-logger.js';

export const TEMPLATE_LABEL = 'template defaults';

export type TierChangeHandler = (tier: AnalysisTier, pendingIds: string[]) => void;

export interface OrchestratorOptions {
  primary?: TierStrategy;
  secondary?: TierStrategy;
  grouper?: HolisticGrouper;
  template?: TemplateDefaults;
  /** Per-image calls in flight within a tier (default 6) */
  concurrency?: number;
  /** Per external call (default 60s) */
  callTimeoutMs?: number;
  /** In-place retries for transient errors, clamped to 0..1 */
  inPlaceRetries?: number;
  retryDelayMs?: number;
  table?: SynonymTable;
  thresholds?: Thresholds;
  boosts?: Boosts;
  onTierChange?: TierChangeHandler;
  createLogger?: (requestId: string) => RequestLogger;
  now?: () => Date;
  newRequestId?: () => string;
}

export interface RunOptions {
  requestId?: string;
  onTierChange?: TierChangeHandler;
}

export interface AnalysisOutcome {
  requestId: string;
  state: 'DONE' | 'PARTIAL';
  listings: Listing[];
  groups: FurnitureGroup[];
  tierByImage: Record<string, AnalysisTier>;
  tiersVisited: AnalysisTier[];
  groupingMethod: GroupingMethod;
  warning?: string;
  errors: AnalysisRequest['errors'];
  metrics: RunMetrics;
  /** This run's log entries, oldest first */
  log: LogEntry[];
}

export interface Orchestrator {
  run(images: readonly UploadedImage[], options?: RunOptions): Promise<AnalysisOutcome>;
}

type Attempt = { ok: true; analysis: ImageAnalysis } | { ok: false; image: UploadedImage; error: AnalysisError };

function validateBatch(images: readonly UploadedImage[]): void {
  if (!images.length) {
    throw new InvalidRequestError('No images to analyze');
  }
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const image of images) {
    if (!image.imageId) throw new InvalidRequestError('Every image needs an imageId');
    if (seen.has(image.imageId)) duplicates.add(image.imageId);
    seen.add(image.imageId);
  }
  if (duplicates.size) {
    throw new InvalidRequestError(`Duplicate image ids: ${[...duplicates].join(', ')}`, {
      duplicates: [...duplicates],
    });
  }
}

/**
 * Build an orchestrator. Throws ConfigurationError when thresholds or template
 * defaults are invalid.
 */
export function createOrchestrator(options: OrchestratorOptions = {}): Orchestrator {
  const thresholds = options.thresholds ?? cfg.thresholds;
  const boosts = options.boosts ?? cfg.boosts;
  assertThresholds(thresholds, boosts);
  const templateTier = createTemplateTier(options.template ?? cfg.template);
  const table = options.table ?? getSynonymTable();

  const concurrency = Math.max(1, options.concurrency ?? 6);
  const callTimeoutMs = options.callTimeoutMs ?? 60_000;
  const retries = Math.min(1, Math.max(0, Math.floor(options.inPlaceRetries ?? 1)));
  const retryDelayMs = Math.max(0, options.retryDelayMs ?? 500);
  const now = options.now ?? (() => new Date());
  const newRequestId = options.newRequestId ?? randomUUID;
  const createLogger =
    options.createLogger ?? ((requestId: string) => createRequestLogger({ prefix: `orchestrator ${requestId}` }));

  async function callWithRetry<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    label: string,
    log: RequestLogger
  ): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await withTimeout(fn, callTimeoutMs, label);
      } catch (err) {
        const error = classifyProviderError(err);
        if (error instanceof TransientProviderError && attempt < retries) {
          log.warn(`${label} failed (${error.message}), retrying once`);
          await sleep(retryDelayMs);
          continue;
        }
        throw error;
      }
    }
  }

  async function run(images: readonly UploadedImage[], runOptions: RunOptions = {}): Promise<AnalysisOutcome> {
    validateBatch(images);

    const request: AnalysisRequest = {
      requestId: runOptions.requestId ?? newRequestId(),
      images: images.slice(),
      state: 'PRIMARY',
      tiersVisited: [],
      errors: [],
      startedAt: Date.now(),
    };
    const log = createLogger(request.requestId);
    const onTierChange = runOptions.onTierChange ?? options.onTierChange;

    const indexOf = new Map(images.map((img, i) => [img.imageId, i]));
    const results = new Map<string, ImageAnalysis>();
    let pending: UploadedImage[] = images.slice();

    function enterTier(tier: AnalysisTier): void {
      request.state = tier;
      request.tiersVisited.push(tier);
      const ids = pending.map((img) => img.imageId);
      log.info(`Entering ${tier} with ${ids.length} image(s)`, { pending: ids });
      onTierChange?.(tier, ids);
    }

    function record(analysis: ImageAnalysis): void {
      // Each image is written exactly once
      if (!results.has(analysis.imageId)) results.set(analysis.imageId, analysis);
    }

    async function runAiTier(strategy: TierStrategy | undefined, tier: 'PRIMARY' | 'SECONDARY'): Promise<ImageAnalysis[]> {
      if (!pending.length) return [];
      if (!strategy || !strategy.available()) {
        const error = new ProviderUnavailableError(`${tier} analysis unavailable`, { tier });
        request.errors.push({ tier, imageId: null, code: error.code, message: error.message });
        log.warn(`Skipping ${tier}: ${error.message}`);
        return [];
      }

      const active = strategy;
      enterTier(tier);
      const attempts = await mapLimit(pending, concurrency, async (image): Promise<Attempt> => {
        const inputIndex = indexOf.get(image.imageId) ?? 0;
        try {
          const raw = await callWithRetry((signal) => active.analyze(image, signal), `${active.label} ${image.imageId}`, log);
          const attrs = parseVisionAttributes(raw);
          const analysis: ImageAnalysis = Object.freeze({
            ...attrs,
            imageId: image.imageId,
            reference: image.reference,
            inputIndex,
            tier,
          });
          return { ok: true, analysis };
        } catch (err) {
          return { ok: false, image, error: classifyProviderError(err) };
        }
      });

      const succeeded: ImageAnalysis[] = [];
      const failed: UploadedImage[] = [];
      for (const attempt of attempts) {
        if (attempt.ok) {
          record(attempt.analysis);
          succeeded.push(attempt.analysis);
        } else {
          failed.push(attempt.image);
          request.errors.push({
            tier,
            imageId: attempt.image.imageId,
            code: attempt.error.code,
            message: attempt.error.message,
          });
          log.warn(`${tier} failed for ${attempt.image.imageId} (${attempt.error.code}): ${attempt.error.message}`);
        }
      }
      pending = failed;
      log.info(`${tier} done: ${succeeded.length} analyzed, ${failed.length} descending`);
      return succeeded;
    }

    let groups: FurnitureGroup[] = [];
    let groupingMethod: GroupingMethod = 'template';
    let violations: PartitionViolationError[] = [];
    let groupingDegraded = false;

    // PRIMARY: per-image workflow, then one holistic grouping call
    const primary = await runAiTier(options.primary, 'PRIMARY');
    if (primary.length) {
      const grouper = options.grouper;
      const guarded: HolisticGrouper | undefined = grouper && {
        available: () => grouper.available(),
        groupHolistically: (analyses) =>
          callWithRetry((signal) => grouper.groupHolistically(analyses, signal), 'holistic grouping', log),
      };
      const result = await groupAnalyses(primary, { grouper: guarded, logger: log, table, thresholds, boosts });
      groups = result.groups;
      groupingMethod = result.method;
      violations = result.violations;
      if (result.error || !guarded) {
        groupingDegraded = true;
        const error = result.error ?? new ProviderUnavailableError('Holistic grouper not configured');
        request.errors.push({ tier: 'PRIMARY', imageId: null, code: error.code, message: `Grouping: ${error.message}` });
      }
    }

    // SECONDARY: multi-agent per image, merged into existing groups heuristically
    const secondary = await runAiTier(options.secondary, 'SECONDARY');
    if (secondary.length) {
      groups = groupHeuristically(secondary, { seeds: groups, table, thresholds, boosts });
      if (groupingMethod === 'template') groupingMethod = 'heuristic';
    }

    // TERTIARY: template defaults, one singleton per image
    if (pending.length) {
      enterTier('TERTIARY');
      const templated = pending.map((image) => templateTier.analyze(image, indexOf.get(image.imageId) ?? 0));
      templated.forEach(record);
      groups = finalizeGroups([...groups, ...singletonGroups(templated, 'template', table)], table);
      pending = [];
    }

    const tierByImage: Record<string, AnalysisTier> = {};
    for (const image of images) {
      const analysis = results.get(image.imageId);
      if (analysis) tierByImage[image.imageId] = analysis.tier;
    }

    const counts: Record<AnalysisTier, number> = { PRIMARY: 0, SECONDARY: 0, TERTIARY: 0 };
    for (const tier of Object.values(tierByImage)) counts[tier]++;
    const aiCount = counts.PRIMARY + counts.SECONDARY;

    const parts: string[] = [];
    if (counts.SECONDARY) {
      const label = options.secondary?.label ?? 'SECONDARY';
      parts.push(`${counts.SECONDARY} of ${images.length} images analyzed by ${label}`);
    }
    if (counts.TERTIARY) {
      parts.push(`${counts.TERTIARY} of ${images.length} images analyzed by ${TEMPLATE_LABEL}`);
    }
    if (groupingDegraded) {
      parts.push('AI grouping unavailable, used heuristic grouping');
    }
    const warning = parts.length ? `Degraded analysis: ${parts.join('; ')}` : undefined;

    const state = aiCount > 0 && counts.TERTIARY > 0 ? 'PARTIAL' : 'DONE';
    request.state = state;

    const listings = assembleListings(groups, { now, table });
    const metrics = buildRunMetrics({
      groups,
      tierByImage,
      groupingMethod,
      violations,
      thresholds: {
        ...getThresholdsSnapshot(),
        strongScore: thresholds.strong,
        categoryScore: thresholds.category,
        typeScore: thresholds.furnitureType,
        categoryBoost: boosts.category,
        colorBoost: boosts.color,
      },
      durationMs: Date.now() - request.startedAt,
      now,
    });
    log.info(formatMetricsLog(metrics));
    if (warning) log.warn(warning);

    return {
      requestId: request.requestId,
      state,
      listings,
      groups,
      tierByImage,
      tiersVisited: request.tiersVisited.slice(),
      groupingMethod,
      warning,
      errors: request.errors.slice(),
      metrics,
      log: log.entries(),
    };
  }

  return { run };
}
