import OpenAI from "openai";
import { cfg } from "../config.js";

export const USER_AGENT = "furniture-lister-analyzer/1.0";

export interface OpenAIClientOptions {
  baseURL?: string;
  /** Per request; the orchestrator also aborts at this limit */
  timeoutMs?: number;
}

/**
 * Build the OpenAI client used by every analysis tier.
 * A missing key is not fatal here: the tiers report themselves unavailable.
 * SDK retries are off; the orchestrator owns the single in-place retry.
 */
export function createOpenAIClient(
  apiKey: string = cfg.openai.apiKey,
  options: OpenAIClientOptions = {}
): OpenAI {
  if (!apiKey) {
    console.warn("[openai] Warning: OPENAI_API_KEY not set. AI tiers will be skipped.");
  }

  return new OpenAI({
    apiKey: apiKey || "",
    baseURL: options.baseURL ?? cfg.openai.baseURL,
    maxRetries: 0,
    timeout: options.timeoutMs ?? cfg.analysis.callTimeoutMs,
    defaultHeaders: { "User-Agent": USER_AGENT },
  });
}
