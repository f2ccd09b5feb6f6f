import 'dotenv/config';

function intFrom(value: string | undefined, fallback: number): number {
  const n = parseInt(value || '', 10);
  return Number.isFinite(n) ? n : fallback;
}

export const cfg = {
  port: Number(process.env.PORT || 3000),

  openai: {
    apiKey: process.env.OPENAI_API_KEY || '',
    // Unset means the SDK default endpoint
    baseURL: process.env.OPENAI_BASE_URL || undefined,
    visionModel: process.env.VISION_MODEL || 'gpt-4o',
    textModel: process.env.TEXT_MODEL || 'gpt-4o-mini',
  },

  analysis: {
    maxImages: intFrom(process.env.MAX_IMAGES, 15),
    concurrency: Math.max(1, intFrom(process.env.ANALYSIS_CONCURRENCY, 6)),
    callTimeoutMs: intFrom(process.env.ANALYSIS_CALL_TIMEOUT_MS, 60000),
    // At most one in-place retry per tier
    inPlaceRetries: Math.min(1, Math.max(0, intFrom(process.env.ANALYSIS_IN_PLACE_RETRIES, 1))),
    retryDelayMs: intFrom(process.env.ANALYSIS_RETRY_DELAY_MS, 500),
  },

  // express.json body limit; uploads arrive base64-encoded
  uploadLimit: process.env.UPLOAD_LIMIT || '50mb',
};
