import fastify from "fastify";
import type { FastifyBaseLogger } from "fastify";
import type { AuditEntry, BucketDecision, BucketState, RateLimitEvent, RateLimitRuleInput } from "@tollgate/shared";
import { RuleRegistry } from "../../apps/api/src/rules/registry.js";
import { RateLimitRule } from "../../apps/api/src/rules/rule.js";
import { RuleSet } from "../../apps/api/src/rules/rule-set.js";
import type { AuditSink } from "../../apps/api/src/services/audit.js";
import type { EventPublisher } from "../../apps/api/src/services/events.js";
import type { BucketStore } from "../../apps/api/src/store/types.js";

export function silentLogger(): FastifyBaseLogger {
  return fastify({ logger: false }).log;
}

export function registryOf(rules: Record<string, RateLimitRuleInput>): RuleRegistry {
  return new RuleRegistry(
    RuleSet.fromRules(Object.entries(rules).map(([operationId, input]) => RateLimitRule.create(operationId, input)))
  );
}

export class RecordingPublisher implements EventPublisher {
  readonly events: RateLimitEvent[] = [];

  async publish(event: RateLimitEvent): Promise<void> {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }
}

export class RecordingAuditSink implements AuditSink {
  readonly entries: AuditEntry[] = [];

  async init(): Promise<void> {
    return;
  }

  async record(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
  }

  async close(): Promise<void> {
    return;
  }
}

/** Store whose every operation fails with `error`, or never settles when `error` is omitted. */
export class BrokenStore implements BucketStore {
  readonly kind = "redis" as const;
  evaluations = 0;

  constructor(private readonly error?: unknown) {}

  async evaluate(): Promise<BucketDecision> {
    this.evaluations += 1;
    return this.fail();
  }

  async peek(): Promise<number> {
    return this.fail();
  }

  async inspect(): Promise<BucketState | null> {
    return this.fail();
  }

  async reset(): Promise<void> {
    return this.fail();
  }

  async healthcheck(): Promise<boolean> {
    return false;
  }

  async close(): Promise<void> {
    return;
  }

  private fail(): Promise<never> {
    if (this.error === undefined) {
      return new Promise<never>(() => undefined);
    }
    return Promise.reject(this.error);
  }
}

/** Compact, unsigned JWT carrying `claims`. */
export function unsignedJwt(claims: Record<string, unknown>): string {
  const encode = (value: unknown) => Buffer.from(JSON.stringify(value)).toString("base64url");
  return `${encode({ alg: "none", typ: "JWT" })}.${encode(claims)}.signature`;
}
