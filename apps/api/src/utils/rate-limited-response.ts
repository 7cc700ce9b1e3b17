import type { BlockedVerdict } from "@rankguard/schemas";

export type RateLimitErrorType = "ratelimit.hits_exceeded" | "ratelimit.delay_exceeded" | "ratelimit.limited";

export interface RateLimitedBody {
  error: string;
  statusCode: 429;
  message: string | null;
  /** Whole seconds until the block ends, rounded up. */
  limitedFor: number;
  errorType: RateLimitErrorType;
  hits?: number;
  delayMs?: number;
}

export function retryAfterSeconds(verdict: BlockedVerdict): number {
  return Math.max(1, Math.ceil(verdict.retryAfterMs / 1000));
}

export function rateLimitedBody(verdict: BlockedVerdict): RateLimitedBody {
  const { cause } = verdict;
  const body: RateLimitedBody = {
    error: cause.reason,
    statusCode: 429,
    message: cause.message,
    limitedFor: retryAfterSeconds(verdict),
    errorType: "ratelimit.limited",
  };

  if (cause.kind === "count") {
    body.errorType = "ratelimit.hits_exceeded";
    body.hits = cause.hits;
  } else if (cause.kind === "delay") {
    body.errorType = "ratelimit.delay_exceeded";
    body.delayMs = cause.delayMs;
  }
  return body;
}
