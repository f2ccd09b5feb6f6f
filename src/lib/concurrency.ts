// Small async helpers shared by the analysis tiers.

import { TransientProviderError } from '../grouping/errors.js';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` over `items` with at most `limit` calls in flight.
 * Results keep the order of `items`.
 */
export async function mapLimit<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let nextIndex = 0;

  async function worker() {
    while (nextIndex < items.length) {
      const current = nextIndex++;
      results[current] = await fn(items[current], current);
    }
  }

  const workers = new Array(Math.max(1, Math.min(limit, items.length))).fill(0).map(() => worker());
  await Promise.all(workers);
  return results;
}

/**
 * Run `fn` with an AbortSignal. When it has not settled within `ms` the signal
 * is aborted and the returned promise rejects with TransientProviderError.
 * The timer is cleared either way so nothing keeps the process alive.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label = 'call'
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TransientProviderError(`${label} timed out after ${ms}ms`, { reason: 'timeout', timeoutMs: ms });
      controller.abort(error);
      reject(error);
    }, ms);
  });
  try {
    return await Promise.race([Promise.resolve().then(() => fn(controller.signal)), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
