import { z } from "zod";
import { ConfigurationError, RATE_LIMIT_SCOPES } from "@tollgate/shared";
import type { RateLimitRuleInput, RateLimitScope } from "@tollgate/shared";

export const ruleInputSchema = z
  .object({
    capacity: z.number().int().positive(),
    refillRatePerMinute: z.number().positive().finite(),
    scope: z.enum(RATE_LIMIT_SCOPES),
    cost: z.number().int().positive().default(1),
    enabled: z.boolean().default(true)
  })
  .strict();

export class RateLimitRule {
  readonly operationId: string;
  readonly capacity: number;
  readonly refillRatePerMinute: number;
  readonly scope: RateLimitScope;
  readonly cost: number;
  readonly enabled: boolean;

  private constructor(operationId: string, input: z.output<typeof ruleInputSchema>) {
    this.operationId = operationId;
    this.capacity = input.capacity;
    this.refillRatePerMinute = input.refillRatePerMinute;
    this.scope = input.scope;
    this.cost = input.cost;
    this.enabled = input.enabled;
    Object.freeze(this);
  }

  static create(operationId: string, input: RateLimitRuleInput): RateLimitRule {
    return RateLimitRule.parse(operationId, input);
  }

  static parse(operationId: string, input: unknown): RateLimitRule {
    if (operationId.trim().length === 0) {
      throw new ConfigurationError("Rule operation id must not be empty");
    }

    const parsed = ruleInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid rule for operation "${operationId}"`,
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "rule"}: ${issue.message}`)
      );
    }

    return new RateLimitRule(operationId, parsed.data);
  }

  get satisfiable(): boolean {
    return this.capacity >= this.cost;
  }

  ttlSeconds(marginSeconds: number): number {
    return Math.ceil((this.capacity * 60) / this.refillRatePerMinute) + marginSeconds;
  }

  toJSON(): RateLimitRuleInput & { operationId: string } {
    return {
      operationId: this.operationId,
      capacity: this.capacity,
      refillRatePerMinute: this.refillRatePerMinute,
      scope: this.scope,
      cost: this.cost,
      enabled: this.enabled
    };
  }
}
