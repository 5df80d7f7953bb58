import { describe, expect, it } from "vitest";
import { StoreError } from "@tollgate/shared";
import type { BucketState } from "@tollgate/shared";
import { evaluateTokenBucket } from "../../apps/api/src/algorithms/token-bucket.js";
import { NoopEventPublisher } from "../../apps/api/src/services/events.js";
import { MetricsService } from "../../apps/api/src/services/metrics.js";
import { RateLimiter } from "../../apps/api/src/services/rate-limiter.js";
import { InMemoryBucketStore } from "../../apps/api/src/store/memory-store.js";
import type { BucketStore } from "../../apps/api/src/store/types.js";
import { BrokenStore, registryOf, silentLogger } from "../helpers/fixtures.js";

// mulberry32; fixed seeds keep failures reproducible.
function random(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function intBetween(next: () => number, min: number, max: number): number {
  return min + Math.floor(next() * (max - min + 1));
}

const SEEDS = [1, 7, 42, 1337, 9001];

function limiterFor(store: BucketStore, capacity: number): RateLimiter {
  return new RateLimiter(
    registryOf({ op: { capacity, refillRatePerMinute: 1, scope: "global" } }),
    store,
    new NoopEventPublisher(),
    new MetricsService({ collectDefaults: false }),
    silentLogger(),
    { storeTimeoutMs: 50, now: () => 0 }
  );
}

describe("token bucket properties", () => {
  it.each(SEEDS)("admits exactly min(N, capacity) from an instantaneous burst (seed %i)", (seed) => {
    const next = random(seed);

    for (let round = 0; round < 50; round += 1) {
      const capacity = intBetween(next, 1, 40);
      const refillRatePerMinute = intBetween(next, 1, 600);
      const requests = intBetween(next, 0, capacity * 3);

      let state: BucketState | null = null;
      let allowed = 0;
      for (let i = 0; i < requests; i += 1) {
        const outcome = evaluateTokenBucket({ capacity, refillRatePerMinute, cost: 1 }, state, 0);
        state = outcome.state;
        allowed += outcome.decision.allowed ? 1 : 0;
      }

      expect(allowed).toBe(Math.min(requests, capacity));
    }
  });

  it.each(SEEDS)("never admits more than capacity plus refill over a window (seed %i)", (seed) => {
    const next = random(seed);

    for (let round = 0; round < 20; round += 1) {
      const capacity = intBetween(next, 1, 30);
      const refillRatePerMinute = intBetween(next, 1, 120);
      let nowMs = intBetween(next, 0, 1_000_000);
      const startMs = nowMs;

      let state: BucketState | null = null;
      let allowed = 0;
      for (let i = 0; i < 200; i += 1) {
        nowMs += intBetween(next, 0, 2_000);
        const outcome = evaluateTokenBucket({ capacity, refillRatePerMinute, cost: 1 }, state, nowMs);
        state = outcome.state;
        allowed += outcome.decision.allowed ? 1 : 0;

        expect(state.tokens).toBeGreaterThanOrEqual(0);
        expect(state.tokens).toBeLessThanOrEqual(capacity);
      }

      const refill = ((nowMs - startMs) * refillRatePerMinute) / 60_000;
      expect(allowed).toBeLessThanOrEqual(capacity + Math.floor(refill + 1e-9));
    }
  });

  it.each(SEEDS)("admits once the advertised retry-after has passed (seed %i)", (seed) => {
    const next = random(seed);

    for (let round = 0; round < 50; round += 1) {
      const capacity = intBetween(next, 1, 20);
      const refillRatePerMinute = intBetween(next, 1, 600);
      const tokens = next() * 0.999;

      const denied = evaluateTokenBucket({ capacity, refillRatePerMinute, cost: 1 }, { tokens, lastRefillMs: 0 }, 0);
      expect(denied.decision.allowed).toBe(false);

      const waitMs = Math.ceil(denied.decision.retryAfterSeconds * 1000) + 1;
      const retried = evaluateTokenBucket({ capacity, refillRatePerMinute, cost: 1 }, denied.state, waitMs);
      expect(retried.decision.allowed).toBe(true);
    }
  });
});

describe("limiter properties", () => {
  it("admits one of many concurrent checks against a single token", async () => {
    const limiter = limiterFor(new InMemoryBucketStore({ ttlMarginSeconds: 60 }), 1);

    const decisions = await Promise.all(Array.from({ length: 100 }, () => limiter.check("op")));

    expect(decisions.filter((decision) => decision.allowed)).toHaveLength(1);
  });

  it.each(["timeout", "unavailable", "protocol"] as const)("never denies while the store fails with %s", async (reason) => {
    const limiter = limiterFor(new BrokenStore(new StoreError("store failure", reason)), 1);

    const decisions = await Promise.all(Array.from({ length: 25 }, () => limiter.check("op")));

    expect(decisions.every((decision) => decision.allowed && decision.source === "fail_open")).toBe(true);
  });
});
