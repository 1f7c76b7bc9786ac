import { setTimeout as sleep } from "node:timers/promises";
import { abortError } from "./errors";

export interface BackoffOptions {
  /** Total attempts including the first one. */
  maxAttempts: number;
  /** Delay before the second attempt; doubles every attempt after that. */
  baseDelayMs: number;
  maxDelayMs: number;
  /** Random source in [0, 1). Injected by tests. */
  random?: () => number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 8000,
};

/**
 * Delay before retry number `retry` (1-based): exponential growth capped at
 * `maxDelayMs`, with full jitter.
 */
export function backoffDelay(retry: number, opts: BackoffOptions): number {
  const exp = Math.min(opts.maxDelayMs, opts.baseDelayMs * 2 ** (retry - 1));
  const rnd = (opts.random ?? Math.random)();
  return Math.floor(exp * rnd);
}

/** Sleep that rejects as soon as `signal` aborts. */
export async function pause(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) throw abortError(signal);
  if (ms <= 0) return;
  try {
    await sleep(ms, undefined, { signal });
  } catch (e) {
    throw signal?.aborted ? abortError(signal) : e;
  }
}
