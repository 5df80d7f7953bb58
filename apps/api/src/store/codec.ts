import { z } from "zod";
import type { BucketState, RateLimitDecision } from "@tollgate/shared";

const finiteNumber = z.coerce.number().finite();

const bucketHashSchema = z.object({
  tokens: finiteNumber.nonnegative(),
  last_refill_ms: finiteNumber.nonnegative()
});

// Field names match the HSET in the token bucket script.
export function encodeBucketState(state: BucketState): Record<string, string> {
  return {
    tokens: String(state.tokens),
    last_refill_ms: String(state.lastRefillMs)
  };
}

export function decodeBucketState(hash: Record<string, string | undefined>): BucketState | null {
  const parsed = bucketHashSchema.safeParse(hash);
  if (!parsed.success) {
    return null;
  }
  return {
    tokens: parsed.data.tokens,
    lastRefillMs: parsed.data.last_refill_ms
  };
}

export const rateLimitDecisionSchema = z.object({
  operationId: z.string(),
  source: z.enum(["store", "fail_open", "no_rule", "disabled"]),
  allowed: z.boolean(),
  limit: z.number().int().nonnegative(),
  remaining: z.number().int().nonnegative(),
  resetSeconds: z.number().int().nonnegative(),
  retryAfterSeconds: z.number().nonnegative()
}) satisfies z.ZodType<RateLimitDecision>;

export function serializeDecision(decision: RateLimitDecision): string {
  return JSON.stringify(decision);
}

export function deserializeDecision(payload: string): RateLimitDecision {
  return rateLimitDecisionSchema.parse(JSON.parse(payload));
}

export const scriptReplySchema = z.tuple([
  z.union([z.literal(0), z.literal(1)]),
  finiteNumber.nonnegative(),
  z.coerce.number().int().nonnegative(),
  z.coerce.number().int().nonnegative()
]);
