// src/grouping/openai-tiers.ts
/**
 * OpenAI-backed implementations of the AI tiers and the holistic grouper.
 *
 * PRIMARY   one vision call per image returning every attribute
 * SECONDARY focused agents (category, color, style in parallel, then pricing)
 *           merged into one answer
 */

import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { MalformedResponseError } from './errors.js';
import {
  CategoryAgentSchema,
  ColorAgentSchema,
  parseHolisticGrouping,
  parseVisionAttributes,
  PricingAgentSchema,
  StyleAgentSchema,
} from './schema.js';
import type { HolisticGroup, HolisticGrouper, ImageAnalysis, TierStrategy, UploadedImage, VisionAttributes } from './types.js';
import {
  getAnalysisSystemPrompt,
  getCategoryAgentPrompt,
  getColorAgentPrompt,
  getGroupingSystemPrompt,
  getGroupingUserPrompt,
  getPricingAgentPrompt,
  getStyleAgentPrompt,
  getWorkflowPrompt,
} from '../prompt/furniture-prompts.js';

/**
 * The slice of the OpenAI client the tiers use. The real client satisfies it;
 * tests pass a stub.
 */
export interface ChatClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): Promise<{
        choices: Array<{ message: { content: string | null } }>;
      }>;
    };
  };
}

export interface OpenAITierOptions {
  client: ChatClient;
  /** false when no API key is configured */
  enabled?: boolean;
  visionModel?: string;
  textModel?: string;
}

export const WORKFLOW_LABEL = 'AI workflow analysis';
export const MULTI_AGENT_LABEL = 'multi-agent analysis';

function toDataUrl(image: UploadedImage): string {
  return `data:${image.mimeType};base64,${image.bytes.toString('base64')}`;
}

async function askJson(
  client: ChatClient,
  model: string,
  system: string,
  prompt: string,
  image?: UploadedImage,
  signal?: AbortSignal
): Promise<unknown> {
  const response = await client.chat.completions.create(
    {
      model,
      temperature: 0.2,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: system },
        {
          role: 'user',
          content: image
            ? [
                { type: 'text', text: prompt },
                { type: 'image_url', image_url: { url: toDataUrl(image) } },
              ]
            : prompt,
        },
      ],
    },
    { signal }
  );
  const payload = response.choices?.[0]?.message?.content;
  if (!payload || !payload.trim()) {
    throw new MalformedResponseError(`Empty response from ${model}`);
  }
  // SyntaxError is classified as a malformed response upstream
  return JSON.parse(payload);
}

async function askAgent<T>(
  schema: { parse(input: unknown): T },
  client: ChatClient,
  model: string,
  prompt: string,
  image: UploadedImage | undefined,
  signal: AbortSignal | undefined
): Promise<T> {
  const json = await askJson(client, model, getAnalysisSystemPrompt(), prompt, image, signal);
  return schema.parse(json);
}

/**
 * PRIMARY: single-call vision workflow.
 */
export function createWorkflowAnalyzer(options: OpenAITierOptions): TierStrategy {
  const model = options.visionModel ?? 'gpt-4o';
  return {
    tier: 'PRIMARY',
    label: WORKFLOW_LABEL,
    available: () => options.enabled ?? true,
    async analyze(image, signal) {
      const json = await askJson(options.client, model, getAnalysisSystemPrompt(), getWorkflowPrompt(), image, signal);
      return parseVisionAttributes(json);
    },
  };
}

/**
 * SECONDARY: category, color and style agents in parallel, then pricing with
 * their findings. Confidence is the weakest agent's confidence.
 */
export function createMultiAgentAnalyzer(options: OpenAITierOptions): TierStrategy {
  const visionModel = options.visionModel ?? 'gpt-4o';
  const textModel = options.textModel ?? 'gpt-4o-mini';
  return {
    tier: 'SECONDARY',
    label: MULTI_AGENT_LABEL,
    available: () => options.enabled ?? true,
    async analyze(image, signal): Promise<VisionAttributes> {
      const { client } = options;
      const [category, color, style] = await Promise.all([
        askAgent(CategoryAgentSchema, client, visionModel, getCategoryAgentPrompt(), image, signal),
        askAgent(ColorAgentSchema, client, visionModel, getColorAgentPrompt(), image, signal),
        askAgent(StyleAgentSchema, client, visionModel, getStyleAgentPrompt(), image, signal),
      ]);
      const facts = {
        category: category.category,
        subcategory: category.subcategory,
        color: color.color,
        style: style.style,
        material: style.material,
        condition: style.condition,
      };
      const pricing = await askAgent(PricingAgentSchema, client, textModel, getPricingAgentPrompt(facts), undefined, signal);

      return {
        ...facts,
        estimatedPrice: pricing.estimatedPrice,
        confidence: Math.min(category.confidence, color.confidence, style.confidence, pricing.confidence),
        reasoning: category.reasoning,
        title: pricing.title,
        description: pricing.description,
      };
    },
  };
}

/**
 * One text call that partitions every PRIMARY analysis into items.
 */
export function createHolisticGrouper(options: OpenAITierOptions): HolisticGrouper {
  const model = options.textModel ?? 'gpt-4o-mini';
  return {
    available: () => options.enabled ?? true,
    async groupHolistically(analyses: readonly ImageAnalysis[], signal?: AbortSignal): Promise<HolisticGroup[]> {
      const items = analyses.map((a) => ({
        imageId: a.imageId,
        title: a.title,
        category: a.category,
        subcategory: a.subcategory,
        color: a.color,
        material: a.material,
        style: a.style,
      }));
      const json = await askJson(
        options.client,
        model,
        getGroupingSystemPrompt(),
        getGroupingUserPrompt(items),
        undefined,
        signal
      );
      return parseHolisticGrouping(json);
    },
  };
}
