import express from 'express';
import { z } from 'zod';
import { AnalysisError, GroupingErrorCode } from '../grouping/errors.js';
import { CONDITION_OPTIONS } from '../grouping/listing.js';
import type { Orchestrator } from '../grouping/orchestrator.js';
import { collectUploads } from '../lib/upload-images.js';

const UploadSchema = z.object({
  filename: z.string().min(1),
  data: z.string().min(1),
  mimeType: z.string().optional(),
  id: z.string().optional(),
});

export const AnalyzeBodySchema = z.object({
  images: z.array(UploadSchema),
});

export const ANALYZE_PATHS = ['/api/auto-analyze-multiple', '/api/auto-analyze', '/api/classify-furniture'];

export interface AnalyzeRouterOptions {
  orchestrator: Orchestrator;
  maxImages: number;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function createAnalyzeRouter({ orchestrator, maxImages }: AnalyzeRouterOptions): express.Router {
  const router = express.Router();

  // GET /api/condition-options
  router.get('/api/condition-options', (_req, res) => {
    res.json({ conditions: CONDITION_OPTIONS });
  });

  // POST /api/auto-analyze-multiple (also /api/auto-analyze and /api/classify-furniture)
  router.post(ANALYZE_PATHS, async (req, res) => {
    const parsed = AnalyzeBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({
        status: 'error',
        error: 'Invalid request body',
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return;
    }

    const { images, skipped } = collectUploads(parsed.data.images);
    if (skipped.length) {
      console.log(`[analyze] Skipping ${skipped.length} non-image upload(s): ${skipped.join(', ')}`);
    }
    if (!images.length) {
      res.status(400).json({ status: 'error', error: 'No valid images uploaded' });
      return;
    }
    if (images.length > maxImages) {
      res.status(400).json({ status: 'error', error: `Maximum ${maxImages} images allowed` });
      return;
    }

    try {
      const outcome = await orchestrator.run(images);
      res.json({
        status: 'success',
        requestId: outcome.requestId,
        state: outcome.state,
        method: outcome.groupingMethod,
        listings: outcome.listings,
        totalImages: images.length,
        totalFurnitureItems: outcome.listings.length,
        tiersVisited: outcome.tiersVisited,
        tierByImage: outcome.tierByImage,
        warning: outcome.warning ?? null,
        metrics: outcome.metrics,
        // degraded runs carry their log as a failure report
        ...(outcome.warning ? { log: outcome.log } : {}),
      });
    } catch (e) {
      if (e instanceof AnalysisError && e.code === GroupingErrorCode.INVALID_REQUEST) {
        res.status(400).json({ status: 'error', error: e.message });
        return;
      }
      console.error('[analyze] auto-analyze-multiple failed:', e);
      res.status(500).json({ status: 'error', error: errorMessage(e) });
    }
  });

  return router;
}
