/**
 * Express app for the furniture analysis API.
 * Built from injected collaborators so tests can run it with fake tiers.
 */

import express from 'express';
import { cfg } from '../config.js';
import type { Orchestrator } from '../grouping/orchestrator.js';
import { createAnalyzeRouter } from '../routes/analyze.js';

export interface AppOptions {
  orchestrator: Orchestrator;
  maxImages?: number;
  uploadLimit?: string;
}

export function createApp(options: AppOptions): express.Express {
  const app = express();

  app.use(express.json({ limit: options.uploadLimit ?? cfg.uploadLimit }));

  // CORS middleware
  app.use((req, res, next) => {
    const origin = req.headers.origin;
    res.setHeader('Access-Control-Allow-Origin', origin || '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-Requested-With');

    if (req.method === 'OPTIONS') {
      res.status(200).end();
      return;
    }
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(
    createAnalyzeRouter({
      orchestrator: options.orchestrator,
      maxImages: options.maxImages ?? cfg.analysis.maxImages,
    })
  );

  return app;
}
