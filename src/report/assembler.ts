/**
 * Report Assembler merges rule and structure findings into one
 * de-duplicated, filtered, fully ordered list with per-type counts.
 * Pure: no I/O, output depends only on its input.
 */

import type { Recommendation, RecommendationType } from "../catalog/types.js";
import { sortRecommendations } from "../rules/ordering.js";

export interface RecommendationReport {
  recommendations: Recommendation[];
  /** Number of recommendations per type, keys in alphabetical order */
  counts: Partial<Record<RecommendationType, number>>;
  total: number;
}

export interface AssembleOptions {
  /** Keep only these types; everything passes when omitted */
  types?: ReadonlySet<RecommendationType>;
}

export function assembleReport(
  sources: ReadonlyArray<readonly Recommendation[]>,
  options: AssembleOptions = {}
): RecommendationReport {
  const seen = new Set<string>();
  const merged: Recommendation[] = [];

  for (const source of sources) {
    for (const recommendation of source) {
      if (seen.has(recommendation.id)) continue;
      if (options.types && !options.types.has(recommendation.type)) continue;
      seen.add(recommendation.id);
      merged.push(recommendation);
    }
  }

  const recommendations = sortRecommendations(merged);

  const tally = new Map<RecommendationType, number>();
  for (const r of recommendations) tally.set(r.type, (tally.get(r.type) ?? 0) + 1);

  const counts: Partial<Record<RecommendationType, number>> = {};
  for (const type of [...tally.keys()].sort()) {
    counts[type] = tally.get(type);
  }

  return { recommendations, counts, total: recommendations.length };
}
