import type { BucketDecision, BucketState } from "@tollgate/shared";

export interface TokenBucketParams {
  capacity: number;
  refillRatePerMinute: number;
  cost: number;
}

export interface TokenBucketOutcome {
  state: BucketState;
  decision: BucketDecision;
}

/**
 * One refill-check-consume step. `previous` is null for a bucket that has
 * never been observed, which starts full.
 *
 * The returned state must be persisted for both outcomes: skipping the write
 * on a denial would let a client keep an old timestamp and collect refill twice.
 * Multiplications come before divisions so whole-token boundaries stay exact.
 */
export function evaluateTokenBucket(
  params: TokenBucketParams,
  previous: BucketState | null,
  nowMs: number
): TokenBucketOutcome {
  const { capacity, refillRatePerMinute, cost } = params;
  const startTokens = previous?.tokens ?? capacity;
  const lastRefillMs = previous?.lastRefillMs ?? nowMs;

  // Clock skew between nodes can put `now` behind the stored timestamp.
  const elapsedMs = Math.max(0, nowMs - lastRefillMs);
  const refilled = Math.min(capacity, startTokens + (elapsedMs * refillRatePerMinute) / 60_000);

  let tokens = refilled;
  let allowed = false;
  let retryAfterSeconds = 0;

  if (refilled >= cost) {
    tokens = refilled - cost;
    allowed = true;
  } else {
    retryAfterSeconds = ((cost - refilled) * 60) / refillRatePerMinute;
  }

  return {
    state: {
      tokens,
      lastRefillMs: Math.max(lastRefillMs, nowMs)
    },
    decision: {
      allowed,
      limit: capacity,
      remaining: Math.max(0, Math.floor(tokens)),
      resetSeconds: secondsUntilFull(capacity, refillRatePerMinute, tokens),
      retryAfterSeconds
    }
  };
}

export function secondsUntilFull(capacity: number, refillRatePerMinute: number, tokens: number): number {
  return Math.max(0, Math.ceil(((capacity - tokens) * 60) / refillRatePerMinute));
}

export function peekTokens(params: Omit<TokenBucketParams, "cost">, previous: BucketState | null, nowMs: number): number {
  if (!previous) {
    return params.capacity;
  }
  const elapsedMs = Math.max(0, nowMs - previous.lastRefillMs);
  return Math.min(params.capacity, previous.tokens + (elapsedMs * params.refillRatePerMinute) / 60_000);
}
