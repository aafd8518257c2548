/**
 * Recommendation Rules Engine evaluates the selected rule families
 * against usage snapshots and catalog metadata.
 *
 * Population-level figures are computed once per run, then every
 * evaluator sees each in-scope item independently. Several rules may
 * fire for the same item; each is reported on its own.
 */

import type {
  AnalysisWarning,
  CatalogItem,
  Recommendation,
  RecordId,
  RuleFamily,
  UsageMetricSnapshot,
} from "../catalog/types.js";
import type { AnalysisConfig } from "../config/schema.js";
import { median } from "../metrics/aggregator.js";
import { sortRecommendations } from "./ordering.js";
import { RULES } from "./rule-evaluator.js";

export interface RuleEngineInput {
  items: readonly CatalogItem[];
  snapshots: readonly UsageMetricSnapshot[];
  config: AnalysisConfig;
  /** Families to run; defaults to config.ruleFamilies */
  families?: readonly RuleFamily[];
  categoryId?: RecordId;
}

export interface RuleEngineResult {
  recommendations: Recommendation[];
  warnings: AnalysisWarning[];
}

const UNCATEGORIZED = "";

/**
 * Rank-based percentile: the share of the population whose order count
 * is at or below each member's. Equal counts land in the same bucket.
 */
export function orderCountPercentiles(
  population: ReadonlyArray<{ itemId: RecordId; orderCount: number }>
): Map<RecordId, number> {
  const counts = population.map((p) => p.orderCount).sort((a, b) => a - b);
  const percentiles = new Map<RecordId, number>();
  if (counts.length === 0) return percentiles;

  for (const member of population) {
    // counts is sorted: find the last index holding a value <= orderCount
    let lo = 0;
    let hi = counts.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (counts[mid] <= member.orderCount) lo = mid + 1;
      else hi = mid;
    }
    percentiles.set(member.itemId, lo / counts.length);
  }

  return percentiles;
}

/**
 * Median of per-item mean fulfillment hours, grouped by category.
 */
export function categoryFulfillmentMedians(
  items: readonly CatalogItem[],
  snapshotsById: ReadonlyMap<RecordId, UsageMetricSnapshot>
): Map<string, number> {
  const means = new Map<string, number[]>();
  for (const item of items) {
    const itemMean = snapshotsById.get(item.id)?.meanFulfillmentHours;
    if (itemMean === undefined) continue;
    const key = item.categoryId ?? UNCATEGORIZED;
    const bucket = means.get(key);
    if (bucket) bucket.push(itemMean);
    else means.set(key, [itemMean]);
  }

  const medians = new Map<string, number>();
  for (const [key, values] of means) {
    medians.set(key, median(values));
  }
  return medians;
}

export function evaluateRules(input: RuleEngineInput): RuleEngineResult {
  const { config, categoryId } = input;
  const families = input.families ?? config.ruleFamilies;
  const warnings: AnalysisWarning[] = [];

  const itemsById = new Map(input.items.map((item) => [item.id, item]));
  const snapshotsById = new Map<RecordId, UsageMetricSnapshot>();

  for (const snapshot of input.snapshots) {
    if (!itemsById.has(snapshot.itemId)) {
      warnings.push({
        code: "missing_item_metadata",
        message: `No catalog metadata for item ${snapshot.itemId}; rules skipped for it`,
        subjectId: snapshot.itemId,
      });
      continue;
    }
    snapshotsById.set(snapshot.itemId, snapshot);
  }

  const scoped = input.items
    .filter((item) => !categoryId || item.categoryId === categoryId)
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

  const population: Array<{ itemId: RecordId; orderCount: number }> = [];
  for (const item of scoped) {
    if (!item.active) continue;
    const snapshot = snapshotsById.get(item.id);
    const hasUsage = snapshot !== undefined && snapshot.sampleSize > 0;
    if (hasUsage || config.lowUsage.includeZeroActivity) {
      population.push({ itemId: item.id, orderCount: snapshot?.orderCount ?? 0 });
    }
  }

  const percentiles = orderCountPercentiles(population);
  const medians = categoryFulfillmentMedians(scoped, snapshotsById);

  const recommendations: Recommendation[] = [];
  for (const item of scoped) {
    const context = {
      config,
      snapshot: snapshotsById.get(item.id),
      usagePercentile: percentiles.get(item.id),
      categoryMedianFulfillmentHours: medians.get(item.categoryId ?? UNCATEGORIZED),
    };

    for (const family of families) {
      const recommendation = RULES[family].evaluate(item, context);
      if (recommendation) recommendations.push(recommendation);
    }
  }

  return { recommendations: sortRecommendations(recommendations), warnings };
}

/**
 * Describe every rule family with its active thresholds, for agents to read.
 */
export function describeRules(config: AnalysisConfig): string {
  const lines: string[] = ["# Catalog Optimization Rules", ""];

  for (const rule of Object.values(RULES)) {
    const enabled = config.ruleFamilies.includes(rule.family);
    lines.push(`## ${rule.name} (${rule.family})${enabled ? "" : " [disabled]"}`);
    lines.push(`Impact: ${rule.impact} | Effort: ${rule.effort}`);
    lines.push(`Fires when: ${rule.describeThresholds(config)}`);
    lines.push(rule.description);
    lines.push(`Action: ${rule.action}`);
    lines.push("");
  }

  return lines.join("\n");
}
