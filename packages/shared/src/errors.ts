import type { RateLimitScope } from "./types.js";

export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
  }
}

export class ScopeResolutionError extends Error {
  constructor(
    readonly operationId: string,
    readonly scope: RateLimitScope,
    readonly missing: "principalId"
  ) {
    super(`Scope ${scope} for operation "${operationId}" requires ${missing}`);
    this.name = "ScopeResolutionError";
  }
}

export type StoreErrorReason = "timeout" | "unavailable" | "protocol";

export class StoreError extends Error {
  constructor(
    message: string,
    readonly reason: StoreErrorReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "StoreError";
  }
}
