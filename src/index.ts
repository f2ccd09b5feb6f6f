import { cfg } from './config.js';
import { assertThresholds, cfg as groupingCfg, getThresholdsSnapshot } from './grouping/config.js';
import { createHolisticGrouper, createMultiAgentAnalyzer, createWorkflowAnalyzer } from './grouping/openai-tiers.js';
import { createOrchestrator } from './grouping/orchestrator.js';
import { createOpenAIClient } from './lib/openai.js';
import { createApp } from './server/app.js';

export function buildOrchestrator() {
  const client = createOpenAIClient(cfg.openai.apiKey);
  const tierOptions = {
    client,
    enabled: Boolean(cfg.openai.apiKey),
    visionModel: cfg.openai.visionModel,
    textModel: cfg.openai.textModel,
  };

  return createOrchestrator({
    primary: createWorkflowAnalyzer(tierOptions),
    secondary: createMultiAgentAnalyzer(tierOptions),
    grouper: createHolisticGrouper(tierOptions),
    template: groupingCfg.template,
    concurrency: cfg.analysis.concurrency,
    callTimeoutMs: cfg.analysis.callTimeoutMs,
    inPlaceRetries: cfg.analysis.inPlaceRetries,
    retryDelayMs: cfg.analysis.retryDelayMs,
  });
}

if (require.main === module) {
  // Invalid thresholds abort startup
  assertThresholds();
  console.log('[server] grouping thresholds', getThresholdsSnapshot());

  const app = createApp({ orchestrator: buildOrchestrator(), maxImages: cfg.analysis.maxImages });
  app.listen(cfg.port, () => {
    console.log(`[server] listening on http://localhost:${cfg.port}`);
  });
}
