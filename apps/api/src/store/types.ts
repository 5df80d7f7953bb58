import type { BucketDecision, BucketState } from "@tollgate/shared";
import type { RateLimitRule } from "../rules/rule.js";

/**
 * Shared bucket storage. `evaluate` must run refill, check and write as one
 * atomic step for a key: two callers racing for the last token cannot both
 * be admitted. Failures surface as StoreError.
 */
export interface BucketStore {
  readonly kind: "redis" | "memory";
  evaluate(key: string, rule: RateLimitRule, nowMs: number, cost?: number): Promise<BucketDecision>;
  peek(key: string, rule: RateLimitRule, nowMs: number): Promise<number>;
  inspect(key: string, nowMs: number): Promise<BucketState | null>;
  reset(key: string): Promise<void>;
  healthcheck(): Promise<boolean>;
  close(): Promise<void>;
}
