import { Level } from "../catalog/types.js";
import type { Recommendation } from "../catalog/types.js";

const LEVEL_RANK: Record<Level, number> = {
  [Level.LOW]: 0,
  [Level.MEDIUM]: 1,
  [Level.HIGH]: 2,
};

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Total order over recommendations: impact desc, effort asc,
 * affected-item count desc, type name asc, id asc.
 */
export function compareRecommendations(a: Recommendation, b: Recommendation): number {
  return (
    LEVEL_RANK[b.impact] - LEVEL_RANK[a.impact] ||
    LEVEL_RANK[a.effort] - LEVEL_RANK[b.effort] ||
    b.itemIds.length - a.itemIds.length ||
    compareText(a.type, b.type) ||
    compareText(a.id, b.id)
  );
}

export function sortRecommendations(recommendations: readonly Recommendation[]): Recommendation[] {
  return [...recommendations].sort(compareRecommendations);
}
