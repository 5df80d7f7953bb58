import type { Redis } from "ioredis";
import { StoreError } from "@tollgate/shared";
import type { BucketDecision, BucketState } from "@tollgate/shared";
import type { ScriptRunner } from "../redis/scripts.js";
import type { RateLimitRule } from "../rules/rule.js";
import { decodeBucketState, scriptReplySchema } from "./codec.js";
import type { BucketStore } from "./types.js";

export interface RedisBucketStoreOptions {
  keyPrefix: string;
  ttlMarginSeconds: number;
}

export function toStoreError(error: unknown): StoreError {
  if (error instanceof StoreError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (/timed out|timeout/i.test(message)) {
    return new StoreError(`Redis command timed out: ${message}`, "timeout", { cause: error });
  }
  if (error instanceof Error && error.name === "ReplyError") {
    return new StoreError(`Redis rejected the command: ${message}`, "protocol", { cause: error });
  }
  return new StoreError(`Redis unavailable: ${message}`, "unavailable", { cause: error });
}

export class RedisBucketStore implements BucketStore {
  readonly kind = "redis" as const;

  constructor(
    private readonly redis: Redis,
    private readonly scripts: ScriptRunner,
    private readonly options: RedisBucketStoreOptions
  ) {}

  storageKey(key: string): string {
    return `${this.options.keyPrefix}:tb:${key}`;
  }

  async evaluate(key: string, rule: RateLimitRule, nowMs: number, cost = rule.cost): Promise<BucketDecision> {
    let reply: unknown;
    try {
      reply = await this.scripts.evalScript(
        "token_bucket",
        [this.storageKey(key)],
        [rule.capacity, rule.refillRatePerMinute, cost, nowMs, rule.ttlSeconds(this.options.ttlMarginSeconds)]
      );
    } catch (error) {
      throw toStoreError(error);
    }

    const parsed = scriptReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw new StoreError(`Unexpected token bucket reply: ${JSON.stringify(reply)}`, "protocol");
    }

    const [allowed, retryAfterSeconds, remaining, resetSeconds] = parsed.data;
    return {
      allowed: allowed === 1,
      limit: rule.capacity,
      remaining,
      resetSeconds,
      retryAfterSeconds
    };
  }

  async peek(key: string, rule: RateLimitRule, nowMs: number): Promise<number> {
    let reply: unknown;
    try {
      reply = await this.scripts.evalScript(
        "token_bucket_peek",
        [this.storageKey(key)],
        [rule.capacity, rule.refillRatePerMinute, nowMs]
      );
    } catch (error) {
      throw toStoreError(error);
    }

    if (typeof reply !== "number" || !Number.isInteger(reply) || reply < 0) {
      throw new StoreError(`Unexpected peek reply: ${JSON.stringify(reply)}`, "protocol");
    }
    return reply;
  }

  async inspect(key: string): Promise<BucketState | null> {
    try {
      return decodeBucketState(await this.redis.hgetall(this.storageKey(key)));
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async reset(key: string): Promise<void> {
    try {
      await this.redis.del(this.storageKey(key));
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async healthcheck(): Promise<boolean> {
    return this.redis
      .ping()
      .then((res: string) => res === "PONG")
      .catch(() => false);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
