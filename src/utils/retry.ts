import { RetryPolicy } from "./types/chain.types";
import { RpcTimeoutError } from "./errors";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Rejects with RpcTimeoutError when `operation` does not settle within
 * `timeoutMs`. The timer is always cleared so nothing keeps the process alive.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  run: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new RpcTimeoutError(operation, timeoutMs)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([run(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function calculateBackoffDelay(
  attempt: number,
  policy: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs" | "backoffMultiplier">
): number {
  const delay =
    policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Runs `run` with a timeout, retrying up to `policy.maxRetries` more times
 * with exponential backoff. The last error is rethrown.
 */
export async function retryWithBackoff<T>(
  operation: string,
  policy: RetryPolicy,
  run: () => Promise<T>,
  options: {
    sleep?: Sleep;
    onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
  } = {}
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let attempt = 0;

  for (;;) {
    try {
      return await withTimeout(operation, policy.timeoutMs, run);
    } catch (error) {
      attempt++;
      if (attempt > policy.maxRetries) {
        throw error;
      }
      const delay = calculateBackoffDelay(attempt, policy);
      options.onRetry?.(attempt, delay, error);
      await wait(delay);
    }
  }
}
