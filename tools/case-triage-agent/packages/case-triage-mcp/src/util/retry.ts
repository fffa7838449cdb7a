import { InvocationCancelledError } from "../errors.js";

export type RetryPolicy = {
  maxAttempts: number;
  retryDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  retryDelayMs: 2000,
  backoffFactor: 1,
  maxDelayMs: 30_000
};

/** Delay before the attempt that follows `attempt` (1-based). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const raw = policy.retryDelayMs * Math.pow(policy.backoffFactor, Math.max(0, attempt - 1));
  return Math.min(raw, policy.maxDelayMs);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new InvocationCancelledError("Cancelled before wait"));
  }
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new InvocationCancelledError("Cancelled during wait"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
