import { setTimeout as delay } from "node:timers/promises";

export type RetryConfig = {
  retries: number;
  backoffMs: number;
};

export type RetryHooks = {
  onRetry?: (info: { attempt: number; waitMs: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<unknown>;
};

/**
 * Runs `fn` up to `retries + 1` times with exponential backoff
 * (`backoffMs`, `2 * backoffMs`, ...). The last error is rethrown.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig,
  hooks: RetryHooks = {}
): Promise<T> {
  const sleep = hooks.sleep ?? delay;
  let attempt = 0;
  let lastError: unknown;

  while (attempt <= config.retries) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === config.retries) break;
      const waitMs = config.backoffMs * Math.pow(2, attempt);
      hooks.onRetry?.({ attempt: attempt + 1, waitMs, error });
      await sleep(waitMs);
      attempt += 1;
    }
  }

  throw lastError;
}
