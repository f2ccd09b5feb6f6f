// src/grouping/errors.ts
/**
 * Error taxonomy for the analysis pipeline.
 *
 * Provider failures are recovered inside the orchestrator. Only
 * ConfigurationError (and InvalidRequestError, raised before any tier runs)
 * ever reach the caller.
 */

import { ZodError } from 'zod';

export enum GroupingErrorCode {
  TRANSIENT_PROVIDER = 'TRANSIENT_PROVIDER',
  MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',
  PARTITION_VIOLATION = 'PARTITION_VIOLATION',
  CONFIGURATION = 'CONFIGURATION',
  INVALID_REQUEST = 'INVALID_REQUEST',
}

export class AnalysisError extends Error {
  constructor(
    public code: GroupingErrorCode,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AnalysisError';
  }
}

/** Timeout, rate limit or upstream 5xx */
export class TransientProviderError extends AnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(GroupingErrorCode.TRANSIENT_PROVIDER, message, details);
    this.name = 'TransientProviderError';
  }
}

/** The provider answered, but not with something we can use */
export class MalformedResponseError extends AnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(GroupingErrorCode.MALFORMED_RESPONSE, message, details);
    this.name = 'MalformedResponseError';
  }
}

export class ProviderUnavailableError extends AnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(GroupingErrorCode.PROVIDER_UNAVAILABLE, message, details);
    this.name = 'ProviderUnavailableError';
  }
}

export type PartitionViolationKind = 'unknown-id' | 'duplicate-id' | 'omitted-id';

/**
 * Raised internally while reconciling an AI grouping answer. Collected, never thrown.
 */
export class PartitionViolationError extends AnalysisError {
  constructor(
    public readonly kind: PartitionViolationKind,
    public readonly imageId: string
  ) {
    super(GroupingErrorCode.PARTITION_VIOLATION, `AI grouping ${kind}: ${imageId}`, { kind, imageId });
    this.name = 'PartitionViolationError';
  }
}

export class ConfigurationError extends AnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(GroupingErrorCode.CONFIGURATION, message, details);
    this.name = 'ConfigurationError';
  }
}

export class InvalidRequestError extends AnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(GroupingErrorCode.INVALID_REQUEST, message, details);
    this.name = 'InvalidRequestError';
  }
}

function statusOf(err: object): number | undefined {
  if ('status' in err && typeof err.status === 'number') return err.status;
  return undefined;
}

function messageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Map whatever a provider call threw onto the taxonomy.
 * Unknown failures count as transient: the image simply moves to the next tier.
 */
export function classifyProviderError(err: unknown): AnalysisError {
  if (err instanceof AnalysisError) return err;

  if (err instanceof ZodError) {
    return new MalformedResponseError(`Response failed validation: ${err.issues.map((i) => i.message).join('; ')}`);
  }
  if (err instanceof SyntaxError) {
    return new MalformedResponseError(`Invalid JSON from provider: ${err.message}`);
  }

  if (typeof err === 'object' && err !== null) {
    const status = statusOf(err);
    if (status === 401 || status === 403) {
      return new ProviderUnavailableError(messageOf(err), { status });
    }
    if (status === 408 || status === 429 || (status !== undefined && status >= 500)) {
      return new TransientProviderError(messageOf(err), { status });
    }
    if (err instanceof Error && (err.name === 'AbortError' || /timed? ?out/i.test(err.message))) {
      return new TransientProviderError(err.message, { reason: 'timeout' });
    }
  }

  return new TransientProviderError(messageOf(err));
}
