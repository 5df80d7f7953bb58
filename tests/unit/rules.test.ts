import { fileURLToPath } from "node:url";
import { describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "@tollgate/shared";
import { RuleRegistry } from "../../apps/api/src/rules/registry.js";
import { RateLimitRule } from "../../apps/api/src/rules/rule.js";
import { RuleSet, loadRuleSetFromFile } from "../../apps/api/src/rules/rule-set.js";

const rulesFile = fileURLToPath(new URL("../../config/rules.json", import.meta.url));

function captureConfigurationError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ConfigurationError");
}

describe("RateLimitRule", () => {
  it("fills in cost and enabled defaults", () => {
    const rule = RateLimitRule.create("POST /v1/auth/login", { capacity: 20, refillRatePerMinute: 5, scope: "ip" });

    expect(rule.toJSON()).toEqual({
      operationId: "POST /v1/auth/login",
      capacity: 20,
      refillRatePerMinute: 5,
      scope: "ip",
      cost: 1,
      enabled: true
    });
    expect(rule.ttlSeconds(60)).toBe(300);
  });

  it("is frozen", () => {
    const rule = RateLimitRule.create("op", { capacity: 1, refillRatePerMinute: 1, scope: "global" });

    expect(Object.isFrozen(rule)).toBe(true);
  });

  it.each([
    ["zero capacity", { capacity: 0, refillRatePerMinute: 5, scope: "ip" }],
    ["fractional capacity", { capacity: 1.5, refillRatePerMinute: 5, scope: "ip" }],
    ["zero refill", { capacity: 10, refillRatePerMinute: 0, scope: "ip" }],
    ["unknown scope", { capacity: 10, refillRatePerMinute: 5, scope: "tenant" }],
    ["zero cost", { capacity: 10, refillRatePerMinute: 5, scope: "ip", cost: 0 }],
    ["unknown field", { capacity: 10, refillRatePerMinute: 5, scope: "ip", burst: 3 }]
  ])("rejects %s", (_label, input) => {
    expect(() => RateLimitRule.parse("op", input)).toThrow(ConfigurationError);
  });

  it("rejects an empty operation id", () => {
    expect(() => RateLimitRule.create("  ", { capacity: 1, refillRatePerMinute: 1, scope: "ip" })).toThrow(
      "Rule operation id must not be empty"
    );
  });

  it("flags a cost above capacity as unsatisfiable", () => {
    const rule = RateLimitRule.create("op", { capacity: 3, refillRatePerMinute: 1, scope: "ip", cost: 5 });

    expect(rule.satisfiable).toBe(false);
  });
});

describe("RuleSet", () => {
  it("reports every invalid rule with its operation id", () => {
    const error = captureConfigurationError(() =>
      RuleSet.parse({
        rules: {
          a: { capacity: 0, refillRatePerMinute: 1, scope: "ip" },
          b: { capacity: 1, refillRatePerMinute: -1, scope: "bogus" },
          c: { capacity: 1, refillRatePerMinute: 1, scope: "ip" }
        }
      })
    );

    expect(error.issues).toHaveLength(3);
    expect(error.issues[0]).toMatch(/^a\.capacity: /);
    expect(error.issues[1]).toMatch(/^b\.refillRatePerMinute: /);
    expect(error.issues[2]).toMatch(/^b\.scope: /);
  });

  it("rejects a file without a rules object", () => {
    const error = captureConfigurationError(() => RuleSet.parse({ limits: {} }));

    expect(error.message).toMatch(/^Invalid rules file/);
  });

  it("rejects duplicate operations", () => {
    const rule = RateLimitRule.create("op", { capacity: 1, refillRatePerMinute: 1, scope: "ip" });

    expect(() => RuleSet.fromRules([rule, rule])).toThrow('Duplicate rule for operation "op"');
  });

  it("lists operations that lack a rule", () => {
    const rules = RuleSet.fromRules([RateLimitRule.create("a", { capacity: 1, refillRatePerMinute: 1, scope: "ip" })]);
    const error = captureConfigurationError(() => rules.assertCovers(["a", "b", "c"]));

    expect(error.issues).toEqual(["missing rule: b", "missing rule: c"]);
  });

  it("loads the shipped rules file", async () => {
    const rules = await loadRuleSetFromFile(rulesFile);

    expect(rules.get("POST /v1/auth/login")?.toJSON()).toEqual({
      operationId: "POST /v1/auth/login",
      capacity: 20,
      refillRatePerMinute: 5,
      scope: "ip",
      cost: 1,
      enabled: true
    });
    expect(rules.list().every((rule) => rule.satisfiable)).toBe(true);
  });

  it("wraps a missing file in a ConfigurationError", async () => {
    await expect(loadRuleSetFromFile("/nonexistent/rules.json")).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe("RuleRegistry", () => {
  const initial = RuleSet.fromRules([
    RateLimitRule.create("login", { capacity: 20, refillRatePerMinute: 5, scope: "ip" }),
    RateLimitRule.create("export", { capacity: 10, refillRatePerMinute: 10, scope: "user", cost: 5 })
  ]);

  it("fails completeness when a registered operation has no rule", () => {
    const registry = new RuleRegistry(initial);
    registry.registerOperation("login");
    registry.registerOperation("signup");

    expect(() => registry.assertComplete()).toThrow("missing rule: signup");
  });

  it("swaps the whole set and notifies listeners", () => {
    const registry = new RuleRegistry(initial);
    const listener = vi.fn();
    registry.onReload(listener);
    registry.registerOperation("login");

    const next = RuleSet.fromRules([RateLimitRule.create("login", { capacity: 5, refillRatePerMinute: 1, scope: "ip" })]);
    registry.replace(next);

    expect(registry.get("login")?.capacity).toBe(5);
    expect(registry.get("export")).toBeUndefined();
    expect(listener).toHaveBeenCalledWith(next, initial);
  });

  it("keeps the active set when a reload drops a registered operation", () => {
    const registry = new RuleRegistry(initial);
    registry.registerOperation("export");

    const next = RuleSet.fromRules([RateLimitRule.create("login", { capacity: 5, refillRatePerMinute: 1, scope: "ip" })]);

    expect(() => registry.replace(next)).toThrow(ConfigurationError);
    expect(registry.rules).toBe(initial);
  });
});
