export const RATE_LIMIT_SCOPES = ["ip", "user", "user_resource", "global"] as const;

export type RateLimitScope = (typeof RATE_LIMIT_SCOPES)[number];

export interface RateLimitRuleInput {
  capacity: number;
  refillRatePerMinute: number;
  scope: RateLimitScope;
  cost?: number;
  enabled?: boolean;
}

export interface RuleFile {
  rules: Record<string, RateLimitRuleInput>;
}

export interface RequestIdentity {
  ip?: string;
  forwardedFor?: string;
  principalId?: string;
  resourceId?: string;
}

export interface RequestMetadata {
  correlationId?: string;
  method?: string;
  path?: string;
}

export interface CheckContext extends RequestIdentity {
  metadata?: RequestMetadata;
}

export interface BucketState {
  tokens: number;
  lastRefillMs: number;
}

export interface BucketDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetSeconds: number;
  retryAfterSeconds: number;
}

export type DecisionSource = "store" | "fail_open" | "no_rule" | "disabled";

export interface RateLimitDecision extends BucketDecision {
  operationId: string;
  source: DecisionSource;
}

export type FailOpenReason = "store_timeout" | "store_unavailable" | "store_protocol" | "scope_unresolved";

export type RateLimitEventType =
  | "ratelimit.checked"
  | "ratelimit.allowed"
  | "ratelimit.denied"
  | "ratelimit.fail_open";

export interface RateLimitEvent {
  id: string;
  type: RateLimitEventType;
  occurredAt: string;
  operationId: string;
  scope: RateLimitScope;
  key?: string;
  cost: number;
  latencyMs: number;
  decision: RateLimitDecision;
  reason?: FailOpenReason;
  request?: RequestMetadata;
}

export type AuditOutcome = "denied" | "fail_open";

export interface AuditEntry {
  eventId: string;
  outcome: AuditOutcome;
  occurredAt: string;
  operationId: string;
  scope: RateLimitScope;
  key?: string;
  limit: number;
  retryAfterSeconds: number;
  reason?: FailOpenReason;
  request?: RequestMetadata;
}
