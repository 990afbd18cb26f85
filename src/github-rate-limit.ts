import type { RateLimitInfo } from "./types.js";

export type HeaderMap = Record<string, string | number | undefined>;

/** Wait used when a rate-limited response carries no usable reset header. */
export const FALLBACK_RATE_LIMIT_WAIT_SECONDS = 60;

export function updateRateLimit(target: RateLimitInfo, headers: HeaderMap) {
  const remaining = parseHeaderNumber(headers["x-ratelimit-remaining"]);
  const limit = parseHeaderNumber(headers["x-ratelimit-limit"]);
  const reset = parseHeaderNumber(headers["x-ratelimit-reset"]);

  if (remaining !== undefined) {
    target.remaining =
      target.remaining === undefined
        ? remaining
        : Math.min(target.remaining, remaining);
  }
  if (limit !== undefined) {
    target.limit = target.limit ?? limit;
  }
  if (reset !== undefined) {
    target.reset = reset;
  }
}

/**
 * A 403 is only a rate limit when the server says so through the
 * remaining-quota header; other 403s are permission failures.
 */
export function isRateLimited(status: number | undefined, headers: HeaderMap) {
  return status === 403 && headers["x-ratelimit-remaining"] !== undefined;
}

/**
 * Seconds to wait before retrying: one second past the server's reset epoch,
 * never negative.
 */
export function resolveRateLimitWait(headers: HeaderMap, nowMs: number) {
  const reset = parseHeaderNumber(headers["x-ratelimit-reset"]);
  if (reset === undefined) {
    return FALLBACK_RATE_LIMIT_WAIT_SECONDS;
  }
  const nowEpoch = Math.floor(nowMs / 1000);
  return Math.max(0, Math.trunc(reset) - nowEpoch + 1);
}

function parseHeaderNumber(value: string | number | undefined) {
  if (value === undefined) return undefined;
  if (typeof value === "number") return value;
  if (value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}
