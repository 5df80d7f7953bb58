import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigurationError } from "@tollgate/shared";
import { RateLimitRule } from "./rule.js";

const ruleFileSchema = z
  .object({
    rules: z.record(z.string(), z.unknown())
  })
  .strict();

export class RuleSet {
  private readonly rules: ReadonlyMap<string, RateLimitRule>;

  private constructor(rules: Map<string, RateLimitRule>) {
    this.rules = rules;
  }

  static empty(): RuleSet {
    return new RuleSet(new Map());
  }

  static fromRules(rules: Iterable<RateLimitRule>): RuleSet {
    const map = new Map<string, RateLimitRule>();
    for (const rule of rules) {
      if (map.has(rule.operationId)) {
        throw new ConfigurationError(`Duplicate rule for operation "${rule.operationId}"`);
      }
      map.set(rule.operationId, rule);
    }
    return new RuleSet(map);
  }

  static parse(raw: unknown): RuleSet {
    const parsed = ruleFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        "Invalid rules file",
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      );
    }

    const rules: RateLimitRule[] = [];
    const issues: string[] = [];
    for (const [operationId, input] of Object.entries(parsed.data.rules)) {
      try {
        rules.push(RateLimitRule.parse(operationId, input));
      } catch (error) {
        if (!(error instanceof ConfigurationError)) {
          throw error;
        }
        issues.push(...(error.issues.length > 0 ? error.issues.map((issue) => `${operationId}.${issue}`) : [error.message]));
      }
    }

    if (issues.length > 0) {
      throw new ConfigurationError("Invalid rules file", issues);
    }

    return RuleSet.fromRules(rules);
  }

  get size(): number {
    return this.rules.size;
  }

  get(operationId: string): RateLimitRule | undefined {
    return this.rules.get(operationId);
  }

  has(operationId: string): boolean {
    return this.rules.has(operationId);
  }

  list(): RateLimitRule[] {
    return [...this.rules.values()];
  }

  assertCovers(operationIds: Iterable<string>): void {
    const missing = [...operationIds].filter((operationId) => !this.rules.has(operationId));
    if (missing.length > 0) {
      throw new ConfigurationError(
        "Registered operations without a rate limit rule",
        missing.map((operationId) => `missing rule: ${operationId}`)
      );
    }
  }
}

export async function loadRuleSetFromFile(path: string): Promise<RuleSet> {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read rules file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new ConfigurationError(`Rules file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  return RuleSet.parse(raw);
}
