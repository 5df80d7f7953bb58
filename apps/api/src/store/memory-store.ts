import type { BucketDecision, BucketState } from "@tollgate/shared";
import { evaluateTokenBucket, peekTokens } from "../algorithms/token-bucket.js";
import { decodeBucketState, encodeBucketState } from "./codec.js";
import type { RateLimitRule } from "../rules/rule.js";
import type { BucketStore } from "./types.js";

interface StoredBucket {
  hash: Record<string, string>;
  expiresAtMs: number;
}

export interface InMemoryBucketStoreOptions {
  ttlMarginSeconds: number;
  pruneThreshold?: number;
}

// Keeps the Redis hash layout. Atomic within one process only: evaluate never yields between read and write.
export class InMemoryBucketStore implements BucketStore {
  readonly kind = "memory" as const;
  private readonly buckets = new Map<string, StoredBucket>();
  private readonly pruneThreshold: number;

  constructor(private readonly options: InMemoryBucketStoreOptions) {
    this.pruneThreshold = options.pruneThreshold ?? 10_000;
  }

  get size(): number {
    return this.buckets.size;
  }

  async evaluate(key: string, rule: RateLimitRule, nowMs: number, cost = rule.cost): Promise<BucketDecision> {
    const previous = this.read(key, nowMs);
    const { state, decision } = evaluateTokenBucket(
      { capacity: rule.capacity, refillRatePerMinute: rule.refillRatePerMinute, cost },
      previous,
      nowMs
    );

    this.buckets.set(key, {
      hash: encodeBucketState(state),
      expiresAtMs: nowMs + rule.ttlSeconds(this.options.ttlMarginSeconds) * 1000
    });

    if (this.buckets.size > this.pruneThreshold) {
      this.prune(nowMs);
    }

    return decision;
  }

  async peek(key: string, rule: RateLimitRule, nowMs: number): Promise<number> {
    return Math.floor(peekTokens(rule, this.read(key, nowMs), nowMs));
  }

  async reset(key: string): Promise<void> {
    this.buckets.delete(key);
  }

  async inspect(key: string, nowMs: number): Promise<BucketState | null> {
    return this.read(key, nowMs);
  }

  async healthcheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.buckets.clear();
  }

  private read(key: string, nowMs: number): BucketState | null {
    const stored = this.buckets.get(key);
    if (!stored) {
      return null;
    }
    if (stored.expiresAtMs <= nowMs) {
      this.buckets.delete(key);
      return null;
    }
    return decodeBucketState(stored.hash);
  }

  private prune(nowMs: number): void {
    for (const [key, stored] of this.buckets) {
      if (stored.expiresAtMs <= nowMs) {
        this.buckets.delete(key);
      }
    }
  }
}
