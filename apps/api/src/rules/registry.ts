import type { RateLimitRule } from "./rule.js";
import type { RuleSet } from "./rule-set.js";

type ReloadListener = (next: RuleSet, previous: RuleSet) => void;

export class RuleRegistry {
  private current: RuleSet;
  private readonly operations = new Set<string>();
  private readonly listeners: ReloadListener[] = [];

  constructor(initial: RuleSet) {
    this.current = initial;
  }

  get rules(): RuleSet {
    return this.current;
  }

  get(operationId: string): RateLimitRule | undefined {
    return this.current.get(operationId);
  }

  registerOperation(operationId: string): void {
    this.operations.add(operationId);
  }

  registeredOperations(): string[] {
    return [...this.operations];
  }

  assertComplete(): void {
    this.current.assertCovers(this.operations);
  }

  replace(next: RuleSet): void {
    next.assertCovers(this.operations);
    const previous = this.current;
    this.current = next;
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }

  onReload(listener: ReloadListener): void {
    this.listeners.push(listener);
  }
}
