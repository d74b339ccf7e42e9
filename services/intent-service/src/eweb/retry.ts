import type { RetryPolicy } from "../config";
import { UpstreamRequestError } from "../errors";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export function isTransient(error: unknown): boolean {
  return error instanceof UpstreamRequestError && error.transient;
}

/** Exponential backoff with up to one base delay of jitter. */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  return policy.baseDelayMs * 2 ** (attempt - 1) + Math.floor(random() * policy.baseDelayMs);
}

export type RetryHooks = {
  sleep?: Sleep;
  random?: () => number;
  signal?: AbortSignal;
  onRetry?: (details: { attempt: number; delayMs: number; error: unknown }) => void;
};

export async function withRetry<T>(
  policy: RetryPolicy,
  action: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await action(attempt);
    } catch (error) {
      if (attempt >= policy.attempts || !isTransient(error) || hooks.signal?.aborted) {
        throw error;
      }
      const delayMs = backoffDelay(policy, attempt, hooks.random);
      hooks.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs, hooks.signal);
    }
  }
}
