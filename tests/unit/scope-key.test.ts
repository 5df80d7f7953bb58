import { describe, expect, it } from "vitest";
import { ScopeResolutionError } from "@tollgate/shared";
import type { RateLimitScope } from "@tollgate/shared";
import { buildScopeKey, clientIp, normalizeIp } from "../../apps/api/src/keys/scope-key.js";
import { RateLimitRule } from "../../apps/api/src/rules/rule.js";

function rule(scope: RateLimitScope, operationId = "POST /v1/auth/login"): RateLimitRule {
  return RateLimitRule.create(operationId, { capacity: 10, refillRatePerMinute: 10, scope });
}

describe("normalizeIp", () => {
  it.each([
    ["203.0.113.7", "203.0.113.7"],
    [" 203.0.113.7 ", "203.0.113.7"],
    ["203.0.113.7:51234", "203.0.113.7"],
    ["::ffff:203.0.113.7", "203.0.113.7"],
    ["2001:DB8::1", "2001:db8::1"],
    ["[2001:db8::1]:443", "2001:db8::1"],
    ["fe80::1%eth0", "fe80::1"],
    ["not-an-ip", "unknown"],
    ["", "unknown"]
  ])("%s becomes %s", (raw, expected) => {
    expect(normalizeIp(raw)).toBe(expected);
  });

  it("maps a missing address to unknown", () => {
    expect(normalizeIp(undefined)).toBe("unknown");
  });
});

describe("clientIp", () => {
  it("prefers the first forwarded hop", () => {
    expect(clientIp({ ip: "10.0.0.2", forwardedFor: "198.51.100.4, 10.0.0.1" })).toBe("198.51.100.4");
  });

  it("falls back to the socket address", () => {
    expect(clientIp({ ip: "10.0.0.2", forwardedFor: " " })).toBe("10.0.0.2");
  });
});

describe("buildScopeKey", () => {
  it("keys ip rules on the normalized address", () => {
    expect(buildScopeKey(rule("ip"), { ip: "::ffff:198.51.100.4" })).toBe("ip:198.51.100.4:POST /v1/auth/login");
  });

  it("keys user rules on the principal", () => {
    expect(buildScopeKey(rule("user", "GET /v1/accounts"), { principalId: "user-42", ip: "10.0.0.1" })).toBe(
      "user:user-42:GET /v1/accounts"
    );
  });

  it("escapes separators inside identifiers", () => {
    const key = buildScopeKey(rule("user_resource", "sync"), { principalId: "a:b", resourceId: "acct%3A1" });

    expect(key).toBe("user_resource:a%3Ab:acct%253A1:sync");
  });

  it("keeps identifiers that are not valid unicode", () => {
    expect(buildScopeKey(rule("user", "acct"), { principalId: "user-\ud800" })).toBe("user:user-\ud800:acct");
  });

  it("uses a placeholder when the resource is missing", () => {
    expect(buildScopeKey(rule("user_resource", "sync"), { principalId: "u1" })).toBe("user_resource:u1:-:sync");
  });

  it("shares one key for global rules", () => {
    expect(buildScopeKey(rule("global", "status"), { ip: "10.0.0.1", principalId: "u1" })).toBe("global:status");
    expect(buildScopeKey(rule("global", "status"), {})).toBe("global:status");
  });

  it("gives different operations different buckets for one identity", () => {
    const identity = { ip: "10.0.0.1" };

    expect(buildScopeKey(rule("ip", "a"), identity)).not.toBe(buildScopeKey(rule("ip", "b"), identity));
  });

  it.each(["user", "user_resource"] as const)("throws for %s scope without a principal", (scope) => {
    expect(() => buildScopeKey(rule(scope), { ip: "10.0.0.1" })).toThrow(ScopeResolutionError);
  });
});
