/**
 * Metrics Aggregator turns raw order events into one usage snapshot
 * per catalog item over a resolved window.
 *
 * Aggregation is per item and order-independent, so events may arrive
 * from any number of fetch slices in any order.
 */

import type {
  AnalysisWarning,
  CatalogItem,
  OrderEvent,
  RecordId,
  ResolvedWindow,
  UsageMetricSnapshot,
} from "../catalog/types.js";
import { inWindow } from "./time-window.js";

export interface AggregationOptions {
  window: ResolvedWindow;
  /** Known catalog items; events pointing elsewhere are orphaned */
  items: readonly CatalogItem[];
  categoryId?: RecordId;
  /** Emit zero snapshots for in-scope items without events */
  includeInactive: boolean;
}

export interface AggregationResult {
  snapshots: UsageMetricSnapshot[];
  warnings: AnalysisWarning[];
  /** Events inside the window that were attributed to an item */
  eventsConsidered: number;
}

interface Tally {
  ordered: number;
  abandoned: number;
  durations: number[];
  approved: number;
  rejected: number;
}

function emptyTally(): Tally {
  return { ordered: 0, abandoned: 0, durations: [], approved: 0, rejected: 0 };
}

export function mean(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total / values.length;
}

export function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

function toSnapshot(itemId: RecordId, tally: Tally, window: ResolvedWindow): UsageMetricSnapshot {
  const sampleSize = tally.ordered + tally.abandoned;
  const snapshot: UsageMetricSnapshot = {
    itemId,
    window,
    orderCount: tally.ordered,
    abandonmentCount: tally.abandoned,
    sampleSize,
    abandonmentRate: sampleSize === 0 ? 0 : tally.abandoned / sampleSize,
  };

  if (tally.durations.length > 0) {
    snapshot.meanFulfillmentHours = mean(tally.durations);
    snapshot.medianFulfillmentHours = median(tally.durations);
  }

  const decided = tally.approved + tally.rejected;
  if (decided > 0) {
    snapshot.approvalRate = tally.approved / decided;
  }

  return snapshot;
}

/**
 * Aggregate events into per-item snapshots, sorted by item id.
 */
export function aggregateUsage(
  events: readonly OrderEvent[],
  options: AggregationOptions
): AggregationResult {
  const { window, categoryId, includeInactive } = options;
  const itemsById = new Map(options.items.map((item) => [item.id, item]));
  const inScope = (item: CatalogItem) => !categoryId || item.categoryId === categoryId;

  const tallies = new Map<RecordId, Tally>();
  const orphaned = new Map<RecordId, number>();
  let eventsConsidered = 0;

  for (const event of events) {
    if (!inWindow(event.timestamp, window)) continue;

    const item = itemsById.get(event.itemId);
    if (!item) {
      orphaned.set(event.itemId, (orphaned.get(event.itemId) ?? 0) + 1);
      continue;
    }
    if (!inScope(item)) continue;

    let tally = tallies.get(item.id);
    if (!tally) {
      tally = emptyTally();
      tallies.set(item.id, tally);
    }
    eventsConsidered++;

    if (event.outcome === "abandoned") {
      tally.abandoned++;
    } else {
      tally.ordered++;
      if (event.fulfillmentHours !== null && Number.isFinite(event.fulfillmentHours)) {
        tally.durations.push(event.fulfillmentHours);
      }
    }

    if (event.approval === "approved") tally.approved++;
    else if (event.approval === "rejected") tally.rejected++;
  }

  if (includeInactive) {
    for (const item of options.items) {
      if (inScope(item) && !tallies.has(item.id)) {
        tallies.set(item.id, emptyTally());
      }
    }
  }

  const snapshots = [...tallies.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([itemId, tally]) => toSnapshot(itemId, tally, window));

  const warnings: AnalysisWarning[] = [...orphaned.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([itemId, count]) => ({
      code: "orphaned_item_reference" as const,
      message: `${count} order event(s) reference unknown catalog item ${itemId}; excluded`,
      subjectId: itemId,
    }));

  return { snapshots, warnings, eventsConsidered };
}
