import { randomUUID } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import { ScopeResolutionError, StoreError } from "@tollgate/shared";
import type {
  BucketDecision,
  BucketState,
  CheckContext,
  FailOpenReason,
  RateLimitDecision,
  RateLimitEvent,
  RateLimitEventType,
  RequestIdentity
} from "@tollgate/shared";
import { buildScopeKey } from "../keys/scope-key.js";
import type { RuleRegistry } from "../rules/registry.js";
import type { RateLimitRule } from "../rules/rule.js";
import type { BucketStore } from "../store/types.js";
import type { EventPublisher } from "./events.js";
import type { MetricsService } from "./metrics.js";

export interface RateLimiterOptions {
  storeTimeoutMs: number;
  now?: () => number;
}

const failOpenReasons: Record<StoreError["reason"], FailOpenReason> = {
  timeout: "store_timeout",
  unavailable: "store_unavailable",
  protocol: "store_protocol"
};

interface CheckTrace {
  rule: RateLimitRule;
  context: CheckContext;
  cost: number;
  startedAt: bigint;
  key?: string;
}

// `check` never throws: an unknown operation, an unresolvable scope or a failing store resolve to an allow.
export class RateLimiter {
  private readonly now: () => number;

  constructor(
    private readonly rules: RuleRegistry,
    private readonly store: BucketStore,
    private readonly events: EventPublisher,
    private readonly metrics: MetricsService,
    private readonly logger: FastifyBaseLogger,
    private readonly options: RateLimiterOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async check(operationId: string, context: CheckContext = {}, cost?: number): Promise<RateLimitDecision> {
    const startedAt = process.hrtime.bigint();
    const rule = this.rules.get(operationId);

    if (!rule) {
      this.logger.warn({ operation: operationId, layer: "limiter" }, "No rate limit rule for operation, allowing");
      this.metrics.checksTotal.inc({ operation: operationId, scope: "none", outcome: "no_rule" });
      return {
        operationId,
        source: "no_rule",
        allowed: true,
        limit: 0,
        remaining: 0,
        resetSeconds: 0,
        retryAfterSeconds: 0
      };
    }

    if (!rule.enabled) {
      this.metrics.checksTotal.inc({ operation: operationId, scope: rule.scope, outcome: "disabled" });
      return {
        operationId,
        source: "disabled",
        allowed: true,
        limit: rule.capacity,
        remaining: rule.capacity,
        resetSeconds: 0,
        retryAfterSeconds: 0
      };
    }

    const trace: CheckTrace = { rule, context, cost: this.resolveCost(rule, cost), startedAt };

    try {
      trace.key = buildScopeKey(rule, context);
    } catch (error) {
      if (!(error instanceof ScopeResolutionError)) {
        throw error;
      }
      this.logger.error(
        { err: error, operation: operationId, scope: rule.scope, layer: "limiter", correlationId: context.metadata?.correlationId },
        "Rate limit scope cannot be resolved, route is misconfigured; allowing"
      );
      return this.failOpen(trace, "scope_unresolved");
    }

    let result: BucketDecision;
    try {
      result = await this.evaluateWithDeadline(trace.key, rule, trace.cost);
    } catch (error) {
      const storeError =
        error instanceof StoreError
          ? error
          : new StoreError(error instanceof Error ? error.message : String(error), "unavailable", { cause: error });

      this.metrics.storeErrorsTotal.inc({ store: this.store.kind, reason: storeError.reason });
      this.logger.error(
        { err: storeError, operation: operationId, key: trace.key, layer: "store", reason: storeError.reason },
        "Bucket store failed, allowing request"
      );
      return this.failOpen(trace, failOpenReasons[storeError.reason]);
    }

    const decision: RateLimitDecision = { ...result, operationId, source: "store" };
    const latencyMs = elapsedMs(startedAt);
    const outcome = decision.allowed ? "allowed" : "denied";

    this.metrics.checksTotal.inc({ operation: operationId, scope: rule.scope, outcome });
    this.metrics.latencyMs.observe({ operation: operationId, outcome }, latencyMs);
    if (!decision.allowed) {
      this.metrics.deniedTotal.inc({ operation: operationId, scope: rule.scope });
    }

    this.logger.info(
      {
        correlationId: context.metadata?.correlationId,
        operation: operationId,
        key: trace.key,
        allowed: decision.allowed,
        remaining: decision.remaining,
        retryAfterSeconds: decision.retryAfterSeconds,
        latencyMs,
        layer: "limiter"
      },
      "Rate limit decision"
    );

    void this.emit("ratelimit.checked", trace, decision, latencyMs);
    void this.emit(decision.allowed ? "ratelimit.allowed" : "ratelimit.denied", trace, decision, latencyMs);

    return decision;
  }

  async remaining(operationId: string, identity: RequestIdentity): Promise<number | null> {
    const rule = this.rules.get(operationId);
    if (!rule) {
      return null;
    }
    if (!rule.enabled) {
      return rule.capacity;
    }

    try {
      const key = buildScopeKey(rule, identity);
      return await this.store.peek(key, rule, this.now());
    } catch (error) {
      if (error instanceof ScopeResolutionError || error instanceof StoreError) {
        this.logger.warn({ err: error, operation: operationId }, "Cannot read remaining tokens, reporting capacity");
        return rule.capacity;
      }
      throw error;
    }
  }

  async inspect(operationId: string, identity: RequestIdentity): Promise<BucketState | null | undefined> {
    const rule = this.rules.get(operationId);
    if (!rule) {
      return undefined;
    }
    return this.store.inspect(buildScopeKey(rule, identity), this.now());
  }

  async reset(operationId: string, identity: RequestIdentity): Promise<boolean> {
    const rule = this.rules.get(operationId);
    if (!rule) {
      return false;
    }

    const key = buildScopeKey(rule, identity);
    await this.store.reset(key);
    this.logger.info({ operation: operationId, key }, "Rate limit bucket reset");
    return true;
  }

  private resolveCost(rule: RateLimitRule, cost: number | undefined): number {
    if (cost === undefined) {
      return rule.cost;
    }
    if (!Number.isInteger(cost) || cost <= 0) {
      this.logger.warn({ operation: rule.operationId, cost, layer: "limiter" }, "Invalid cost override, using rule cost");
      return rule.cost;
    }
    return cost;
  }

  private failOpen(trace: CheckTrace, reason: FailOpenReason): RateLimitDecision {
    const { rule } = trace;
    const decision: RateLimitDecision = {
      operationId: rule.operationId,
      source: "fail_open",
      allowed: true,
      limit: rule.capacity,
      remaining: rule.capacity,
      resetSeconds: 0,
      retryAfterSeconds: 0
    };
    const latencyMs = elapsedMs(trace.startedAt);

    this.metrics.checksTotal.inc({ operation: rule.operationId, scope: rule.scope, outcome: "fail_open" });
    this.metrics.failOpenTotal.inc({ operation: rule.operationId, reason });
    this.metrics.latencyMs.observe({ operation: rule.operationId, outcome: "fail_open" }, latencyMs);

    void this.emit("ratelimit.checked", trace, decision, latencyMs, reason);
    void this.emit("ratelimit.fail_open", trace, decision, latencyMs, reason);

    return decision;
  }

  private async evaluateWithDeadline(key: string, rule: RateLimitRule, cost: number): Promise<BucketDecision> {
    const timeoutMs = this.options.storeTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new StoreError(`Bucket store did not answer within ${timeoutMs}ms`, "timeout"));
      }, timeoutMs);
    });

    try {
      // A late store reply is discarded, not cancelled; the write it carries is atomic either way.
      return await Promise.race([this.store.evaluate(key, rule, this.now(), cost), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async emit(
    type: RateLimitEventType,
    trace: CheckTrace,
    decision: RateLimitDecision,
    latencyMs: number,
    reason?: FailOpenReason
  ): Promise<void> {
    const event: RateLimitEvent = {
      id: randomUUID(),
      type,
      occurredAt: new Date(this.now()).toISOString(),
      operationId: trace.rule.operationId,
      scope: trace.rule.scope,
      key: trace.key,
      cost: trace.cost,
      latencyMs,
      decision,
      reason,
      request: trace.context.metadata
    };

    try {
      await this.events.publish(event);
    } catch (error) {
      this.metrics.eventPublishErrorsTotal.inc({ type });
      this.logger.warn({ err: error, eventType: type, operation: event.operationId }, "Failed to publish rate limit event");
    }
  }
}

function elapsedMs(startedAt: bigint): number {
  return Number(process.hrtime.bigint() - startedAt) / 1_000_000;
}
