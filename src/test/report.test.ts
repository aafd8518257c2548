import { describe, expect, it } from "vitest";

import { Level } from "../catalog/types.js";
import type { Recommendation, RecommendationType } from "../catalog/types.js";
import { assembleReport } from "../report/assembler.js";

function rec(type: RecommendationType, subject: string, impact: Level = Level.LOW): Recommendation {
  return {
    id: `${type}:${subject}`,
    type,
    title: subject,
    description: "",
    action: "",
    impact,
    effort: Level.LOW,
    itemIds: [subject],
    categoryIds: [],
    evidence: {},
  };
}

describe("assembleReport", () => {
  const rules = [rec("low_usage", "a", Level.MEDIUM), rec("inactive_items", "b"), rec("low_usage", "c", Level.MEDIUM)];
  const structure = [rec("naming_inconsistency", "a"), rec("inactive_items", "b"), rec("too_few_items", "x")];

  it("merges, de-duplicates, orders and counts", () => {
    const report = assembleReport([rules, structure]);

    expect(report.recommendations.map((r) => r.id)).toEqual([
      "low_usage:a",
      "low_usage:c",
      "inactive_items:b",
      "naming_inconsistency:a",
      "too_few_items:x",
    ]);
    expect(report.total).toBe(5);
    expect(Object.entries(report.counts)).toEqual([
      ["inactive_items", 1],
      ["low_usage", 2],
      ["naming_inconsistency", 1],
      ["too_few_items", 1],
    ]);
  });

  it("keeps only the requested types", () => {
    const report = assembleReport([rules, structure], { types: new Set<RecommendationType>(["low_usage"]) });
    expect(report.recommendations.map((r) => r.id)).toEqual(["low_usage:a", "low_usage:c"]);
    expect(report.counts).toEqual({ low_usage: 2 });
  });

  it("returns an empty report for no input", () => {
    expect(assembleReport([])).toEqual({ recommendations: [], counts: {}, total: 0 });
  });
});
