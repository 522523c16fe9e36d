import type { CategoryDecision } from "./types.js";

/**
 * Supplies the action for one category bucket. Resolving to null cancels
 * the whole apply phase.
 */
export interface DecisionSource {
  decide(category: string, count: number): Promise<CategoryDecision | null>;
}

export interface CategoryPolicy {
  default: CategoryDecision;
  overrides?: Record<string, CategoryDecision>;
}

/** Fixed per-category actions, used by scheduled and `--yes` runs. */
export class PolicyDecisionSource implements DecisionSource {
  constructor(private readonly policy: CategoryPolicy) {}

  defaultFor(category: string): CategoryDecision {
    return this.policy.overrides?.[category] ?? this.policy.default;
  }

  async decide(category: string): Promise<CategoryDecision> {
    return this.defaultFor(category);
  }
}
