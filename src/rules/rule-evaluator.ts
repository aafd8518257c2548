/**
 * Rule evaluators: one pure predicate-plus-scorer per rule family.
 *
 * Every evaluator returns at most one recommendation for one item.
 * Thresholds come from the config on the context, never from constants.
 */

import { Level } from "../catalog/types.js";
import type { CatalogItem, Recommendation, RuleFamily } from "../catalog/types.js";
import type { AnalysisConfig } from "../config/schema.js";
import type { RuleContext, RuleDefinition, RuleTable } from "./types.js";

const INSTRUCTIONAL_WORDS = /\b(please|click)\b/i;

export function round(value: number, digits: number = 3): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function build(
  rule: RuleDefinition,
  item: CatalogItem,
  title: string,
  description: string,
  evidence: Recommendation["evidence"]
): Recommendation {
  return {
    id: `${rule.family}:${item.id}`,
    type: rule.family,
    title,
    description,
    action: rule.action,
    impact: rule.impact,
    effort: rule.effort,
    itemIds: [item.id],
    categoryIds: item.categoryId ? [item.categoryId] : [],
    evidence,
  };
}

// ── inactive_items ────────────────────────────────────────────

const inactiveItems: RuleDefinition<"inactive_items"> = {
  family: "inactive_items",
  name: "Inactive Items",
  description: "Items marked inactive that received no orders in the window.",
  action: "Review these items and retire them from the catalog",
  impact: Level.LOW,
  effort: Level.LOW,
  describeThresholds: () => "item inactive and zero orders in the window",
  evaluate(item, ctx) {
    const orders = ctx.snapshot?.orderCount ?? 0;
    if (item.active || orders > 0) return null;
    return build(
      inactiveItems,
      item,
      `Retire inactive item "${item.name}"`,
      `"${item.name}" is inactive and had no orders in ${windowLabel(ctx)}.`,
      { orderCount: orders, active: false }
    );
  },
};

// ── low_usage ─────────────────────────────────────────────────

const lowUsage: RuleDefinition<"low_usage"> = {
  family: "low_usage",
  name: "Low Usage",
  description:
    "Active items whose order count falls in the bottom percentile of active items with usage.",
  action: "Promote the item, improve its description, or retire it",
  impact: Level.MEDIUM,
  effort: Level.MEDIUM,
  describeThresholds: (config) =>
    `order-count percentile <= ${config.lowUsage.percentile}` +
    (config.lowUsage.includeZeroActivity ? " (items without activity included)" : ""),
  evaluate(item, ctx) {
    const percentile = ctx.usagePercentile;
    if (!item.active || percentile === undefined) return null;
    if (percentile > ctx.config.lowUsage.percentile) return null;
    const orders = ctx.snapshot?.orderCount ?? 0;
    return build(
      lowUsage,
      item,
      `Low usage: "${item.name}"`,
      `"${item.name}" was ordered ${orders} time(s) in ${windowLabel(ctx)}, ` +
        `placing it at the ${round(percentile * 100, 1)}th percentile.`,
      { orderCount: orders, percentile: round(percentile) }
    );
  },
};

// ── high_abandonment ──────────────────────────────────────────

const highAbandonment: RuleDefinition<"high_abandonment"> = {
  family: "high_abandonment",
  name: "High Abandonment",
  description: "Items frequently added to carts but not ordered.",
  action: "Review the item variables and simplify the ordering process",
  impact: Level.HIGH,
  effort: Level.MEDIUM,
  describeThresholds: (config) =>
    `abandonment rate >= ${config.highAbandonment.threshold} with at least ` +
    `${config.highAbandonment.minimumSampleSize} ordered or abandoned requests`,
  evaluate(item, ctx) {
    const snapshot = ctx.snapshot;
    const { threshold, minimumSampleSize } = ctx.config.highAbandonment;
    if (!snapshot || snapshot.sampleSize < minimumSampleSize) return null;
    if (snapshot.abandonmentRate < threshold) return null;
    return build(
      highAbandonment,
      item,
      `High abandonment: "${item.name}"`,
      `${snapshot.abandonmentCount} of ${snapshot.sampleSize} requests for "${item.name}" ` +
        `were abandoned (${round(snapshot.abandonmentRate * 100, 1)}%).`,
      {
        abandonmentRate: round(snapshot.abandonmentRate),
        abandonmentCount: snapshot.abandonmentCount,
        orderCount: snapshot.orderCount,
        sampleSize: snapshot.sampleSize,
      }
    );
  },
};

// ── slow_fulfillment ──────────────────────────────────────────

const slowFulfillment: RuleDefinition<"slow_fulfillment"> = {
  family: "slow_fulfillment",
  name: "Slow Fulfillment",
  description: "Items whose mean fulfillment time is well above their category's median.",
  action: "Review the fulfillment workflow and identify bottlenecks",
  impact: Level.HIGH,
  effort: Level.HIGH,
  describeThresholds: (config) =>
    `mean fulfillment > ${config.slowFulfillment.ratio} x category median`,
  evaluate(item, ctx) {
    const itemMean = ctx.snapshot?.meanFulfillmentHours;
    const baseline = ctx.categoryMedianFulfillmentHours;
    if (itemMean === undefined || baseline === undefined || baseline <= 0) return null;
    const ratio = itemMean / baseline;
    if (ratio <= ctx.config.slowFulfillment.ratio) return null;
    return build(
      slowFulfillment,
      item,
      `Slow fulfillment: "${item.name}"`,
      `"${item.name}" takes ${round(itemMean, 1)}h on average to fulfill, ` +
        `${round(ratio, 2)}x the category median of ${round(baseline, 1)}h.`,
      {
        meanFulfillmentHours: round(itemMean, 2),
        categoryMedianHours: round(baseline, 2),
        ratio: round(ratio, 2),
      }
    );
  },
};

// ── description_quality ───────────────────────────────────────

function fieldValue(item: CatalogItem, field: AnalysisConfig["descriptionQuality"]["requiredFields"][number]): string {
  switch (field) {
    case "name":
      return item.name;
    case "short_description":
      return item.shortDescription;
    case "description":
      return item.description;
  }
}

export function descriptionIssues(item: CatalogItem, config: AnalysisConfig): string[] {
  const { minLength, requiredFields } = config.descriptionQuality;
  const issues: string[] = [];

  for (const field of requiredFields) {
    if (fieldValue(item, field).trim().length === 0) issues.push(`missing_${field}`);
  }

  const short = item.shortDescription.trim();
  if (short.length < minLength && !issues.includes("missing_short_description")) {
    issues.push("short_description_too_short");
  }
  if (INSTRUCTIONAL_WORDS.test(short)) {
    issues.push("instructional_language");
  }

  return issues;
}

const descriptionQuality: RuleDefinition<"description_quality"> = {
  family: "description_quality",
  name: "Description Quality",
  description: "Active items with short, missing or instructional descriptions.",
  action: "Rewrite the descriptions to be detailed and specific",
  impact: Level.LOW,
  effort: Level.LOW,
  describeThresholds: (config) =>
    `short description < ${config.descriptionQuality.minLength} characters, ` +
    `blank ${config.descriptionQuality.requiredFields.join("/")}, or instructional wording`,
  evaluate(item, ctx) {
    if (!item.active) return null;
    const issues = descriptionIssues(item, ctx.config);
    if (issues.length === 0) return null;
    return build(
      descriptionQuality,
      item,
      `Improve description of "${item.name}"`,
      `"${item.name}" has description issues: ${issues.join(", ")}.`,
      { issues: issues.join(","), shortDescriptionLength: item.shortDescription.trim().length }
    );
  },
};

function windowLabel(ctx: RuleContext): string {
  return ctx.snapshot?.window.label ?? "the analysis window";
}

export const RULES: RuleTable = {
  inactive_items: inactiveItems,
  low_usage: lowUsage,
  high_abandonment: highAbandonment,
  slow_fulfillment: slowFulfillment,
  description_quality: descriptionQuality,
};

export function getRule<F extends RuleFamily>(family: F): RuleDefinition<F> {
  return RULES[family];
}
