/**
 * Rule type definitions.
 *
 * Each rule family is one variant of a closed set, bound to a pure
 * evaluator. Adding a rule means adding a family name and its entry in
 * the evaluator table, never a runtime registry.
 */

import type {
  CatalogItem,
  Level,
  Recommendation,
  RuleFamily,
  UsageMetricSnapshot,
} from "../catalog/types.js";
import type { AnalysisConfig } from "../config/schema.js";

/**
 * Everything an evaluator may look at for a single item. Population-level
 * figures (percentiles, category medians) are computed once per run by the
 * engine and handed in here.
 */
export interface RuleContext {
  config: AnalysisConfig;
  /** Usage in the window; undefined when the item had no events */
  snapshot: UsageMetricSnapshot | undefined;
  /** Order-count percentile among the low-usage population, if a member */
  usagePercentile: number | undefined;
  /** Median of per-item mean fulfillment hours in the item's category */
  categoryMedianFulfillmentHours: number | undefined;
}

export type RuleEvaluator = (
  item: CatalogItem,
  context: RuleContext
) => Recommendation | null;

/**
 * A rule family definition: fixed scoring plus its evaluator.
 */
export interface RuleDefinition<F extends RuleFamily = RuleFamily> {
  family: F;
  /** Human-readable name */
  name: string;
  /** What the rule looks for, for agent reasoning */
  description: string;
  /** Recommended remedy */
  action: string;
  impact: Level;
  effort: Level;
  evaluate: RuleEvaluator;
  /** Active thresholds, rendered for the rules resource */
  describeThresholds: (config: AnalysisConfig) => string;
}

export type RuleTable = { readonly [F in RuleFamily]: RuleDefinition<F> };
