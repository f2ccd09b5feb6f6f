// src/grouping/types.ts
/**
 * Shared types for the furniture grouping pipeline.
 *
 * An upload batch flows through three analysis tiers, then the grouping
 * engine, then the listing assembler. Everything here is plain data; the
 * stages pass these structures to each other explicitly.
 */

export type AnalysisTier = 'PRIMARY' | 'SECONDARY' | 'TERTIARY';

export type OrchestratorState = AnalysisTier | 'DONE' | 'PARTIAL';

/**
 * An image as handed over by the upload layer.
 */
export interface UploadedImage {
  /** Unique within one batch */
  imageId: string;

  /** Source reference copied verbatim into listings (file name or URL) */
  reference: string;

  bytes: Buffer;

  /** e.g. 'image/jpeg' */
  mimeType: string;
}

/**
 * Structured attributes a vision provider returns for one image.
 */
export interface VisionAttributes {
  category: string;
  subcategory: string;
  color: string;
  material: string;
  style: string;
  condition: string;
  estimatedPrice: number | null;
  /** 0–1 */
  confidence: number;
  reasoning: string;
  /** AI-suggested listing title, when the provider wrote one */
  title: string | null;
  description: string | null;
}

export interface ImageAnalysis extends VisionAttributes {
  imageId: string;
  reference: string;
  /** Position of the image in the uploaded batch */
  inputIndex: number;
  /** Tier whose strategy produced these attributes */
  tier: AnalysisTier;
}

export type GroupingMethod = 'ai' | 'heuristic' | 'template';

export interface FurnitureGroup {
  groupId: string;
  imageIds: string[];
  members: ImageAnalysis[];
  representative: ImageAnalysis;
  title: string;
  category: string;
  color: string;
  method: GroupingMethod;
  reasoning: string;
  /** Confidence the grouping decision itself carries (AI answer or heuristic score) */
  confidence: number;
}

export interface ListingImage {
  imageId: string;
  reference: string;
  tier: AnalysisTier;
}

export interface Listing {
  listingId: string;
  groupId: string;
  title: string;
  price: number;
  condition: string;
  description: string;
  category: string;
  marketplaceCategory: string;
  images: ListingImage[];
  confidence: number;
  analysisMethod: AnalysisTier;
  createdAt: string;
}

export interface TierFailure {
  tier: AnalysisTier;
  /** null when the failure concerns the whole tier (e.g. provider unavailable) */
  imageId: string | null;
  code: string;
  message: string;
}

export interface AnalysisRequest {
  requestId: string;
  images: UploadedImage[];
  state: OrchestratorState;
  tiersVisited: AnalysisTier[];
  errors: TierFailure[];
  startedAt: number;
}

/**
 * A single-tier analysis strategy. PRIMARY and SECONDARY are backed by AI
 * providers; the orchestrator only sees this contract.
 */
export interface TierStrategy {
  tier: Exclude<AnalysisTier, 'TERTIARY'>;
  label: string;
  /** false when the provider is categorically unreachable (e.g. no credentials) */
  available(): boolean;
  /** `signal` aborts when the orchestrator's per-call timeout fires */
  analyze(image: UploadedImage, signal?: AbortSignal): Promise<VisionAttributes>;
}

export interface HolisticGroup {
  imageIds: string[];
  reasoning: string;
  confidence: number;
}

export interface HolisticGrouper {
  available(): boolean;
  groupHolistically(analyses: readonly ImageAnalysis[], signal?: AbortSignal): Promise<HolisticGroup[]>;
}
