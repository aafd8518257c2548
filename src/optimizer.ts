/**
 * Catalog Optimizer: the three top-level operations.
 *
 * Each operation validates its request first, then reads through the
 * gateway with every call bounded by the configured timeout, runs the
 * pure analysis components, and wraps the outcome in an OperationResult.
 * Nothing here logs; problems travel back as warnings or failure results.
 */

import {
  ConfigurationError,
  GatewayTimeoutError,
  GatewayUnavailableError,
  errorMessage,
} from "./catalog/errors.js";
import { STRUCTURAL_DEFECTS } from "./catalog/types.js";
import type {
  AnalysisWarning,
  CatalogCategory,
  CatalogItem,
  OperationResult,
  OrderEvent,
  Recommendation,
  RecommendationType,
  RecordId,
  ResolvedWindow,
  RuleFamily,
  TimeWindowSpec,
  UsageMetricSnapshot,
} from "./catalog/types.js";
import { parseRuleFamilies } from "./config/schema.js";
import type { AnalysisConfig } from "./config/schema.js";
import type { CatalogGateway } from "./connectors/types.js";
import { aggregateUsage } from "./metrics/aggregator.js";
import { resolveWindow, sliceWindow } from "./metrics/time-window.js";
import { assembleReport } from "./report/assembler.js";
import type { RecommendationReport } from "./report/assembler.js";
import { evaluateRules } from "./rules/engine.js";
import { analyzeStructure } from "./structure/analyzer.js";

export interface OptimizerOptions {
  config: AnalysisConfig;
  /** Clock used to resolve named windows */
  now?: () => Date;
}

export interface AnalyzeUsageRequest {
  timeWindow?: TimeWindowSpec;
  categoryId?: RecordId;
  includeInactive?: boolean;
}

export interface RecommendationRequest {
  categoryId?: RecordId;
  /** Rule family names; defaults to the configured families */
  ruleFamilies?: readonly string[];
  timeWindow?: TimeWindowSpec;
  /** Also run the structure analyzer and merge its findings */
  includeStructure?: boolean;
}

export interface AnalyzeStructureRequest {
  includeInactive?: boolean;
}

// ── Deadlines ──────────────────────────────────────────────────

/**
 * Run a gateway call under a deadline. The signal handed to the call is
 * aborted when the deadline passes, and the returned promise rejects with
 * GatewayTimeoutError. Any other failure becomes GatewayUnavailableError.
 */
export async function withDeadline<T>(
  operation: string,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Settle first so the timeout wins the race over the aborted call
      reject(new GatewayTimeoutError(operation, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), deadline]);
  } catch (err) {
    if (err instanceof GatewayUnavailableError) throw err;
    throw new GatewayUnavailableError(`${operation} failed: ${errorMessage(err)}`, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

function success<T>(message: string, data: T, warnings: AnalysisWarning[]): OperationResult<T> {
  return { success: true, message, data, warnings };
}

function failure<T>(message: string): OperationResult<T> {
  return { success: false, message, data: null, warnings: [] };
}

// ── Optimizer ──────────────────────────────────────────────────

export class CatalogOptimizer {
  private readonly gateway: CatalogGateway;
  private readonly config: AnalysisConfig;
  private readonly now: () => Date;

  constructor(gateway: CatalogGateway, options: OptimizerOptions) {
    this.gateway = gateway;
    this.config = options.config;
    this.now = options.now ?? (() => new Date());
  }

  getConfig(): AnalysisConfig {
    return this.config;
  }

  /**
   * Per-item usage snapshots for a window.
   */
  analyzeUsage(request: AnalyzeUsageRequest = {}): Promise<OperationResult<UsageMetricSnapshot[]>> {
    return this.guard(async () => {
      const window = this.resolve(request.timeWindow);
      const includeInactive = request.includeInactive ?? false;

      const [items, events] = await Promise.all([
        this.fetchItems(),
        this.fetchEvents(window, request.categoryId),
      ]);

      const aggregation = aggregateUsage(events.events, {
        window,
        items,
        categoryId: request.categoryId,
        includeInactive,
      });
      const warnings = [...events.warnings, ...aggregation.warnings];

      if (aggregation.eventsConsidered === 0) {
        return success(
          `No order activity in ${window.label}` +
            (aggregation.snapshots.length > 0
              ? `; ${aggregation.snapshots.length} item(s) reported with zero usage`
              : ""),
          aggregation.snapshots,
          warnings
        );
      }

      return success(
        `Usage for ${aggregation.snapshots.length} item(s) from ` +
          `${aggregation.eventsConsidered} order event(s) in ${window.label}`,
        aggregation.snapshots,
        warnings
      );
    });
  }

  /**
   * Ranked recommendations from the selected rule families, optionally
   * merged with structural findings.
   */
  getRecommendations(
    request: RecommendationRequest = {}
  ): Promise<OperationResult<RecommendationReport>> {
    return this.guard(async () => {
      const families = this.resolveFamilies(request.ruleFamilies);
      const window = this.resolve(request.timeWindow);
      const includeStructure = request.includeStructure ?? false;
      const { categoryId } = request;

      const [items, categories, events] = await Promise.all([
        this.fetchItems(),
        this.fetchCategories(),
        this.fetchEvents(window, categoryId),
      ]);

      if (items.length === 0) {
        return success("No catalog items found; nothing to recommend", emptyReport(), events.warnings);
      }

      // Zero snapshots for every item so inactive ones are judged on zero orders
      const aggregation = aggregateUsage(events.events, {
        window,
        items,
        categoryId,
        includeInactive: true,
      });
      if (aggregation.eventsConsidered === 0) {
        return success(
          `No order activity in ${window.label}; nothing to recommend`,
          emptyReport(),
          [...events.warnings, ...aggregation.warnings]
        );
      }

      const rules = evaluateRules({
        items,
        snapshots: aggregation.snapshots,
        config: this.config,
        families,
        categoryId,
      });

      const sources: Recommendation[][] = [rules.recommendations];
      const warnings = [...events.warnings, ...aggregation.warnings, ...rules.warnings];
      const types = new Set<RecommendationType>(families);

      if (includeStructure) {
        const structure = analyzeStructure({
          categories,
          items,
          config: this.config,
          includeInactive: false,
        });
        sources.push(
          categoryId
            ? structure.recommendations.filter((r) => touchesCategory(r, categoryId, items))
            : structure.recommendations
        );
        warnings.push(...structure.warnings);
        for (const defect of STRUCTURAL_DEFECTS) types.add(defect);
      }

      const report = assembleReport(sources, { types });
      const message =
        report.total === 0
          ? `No recommendations for ${window.label}`
          : `${report.total} recommendation(s) across ${Object.keys(report.counts).length} ` +
            `type(s) for ${window.label}`;
      return success(message, report, warnings);
    });
  }

  /**
   * Structural defects of the category tree and item set.
   */
  analyzeStructure(
    request: AnalyzeStructureRequest = {}
  ): Promise<OperationResult<Recommendation[]>> {
    return this.guard(async () => {
      const includeInactive = request.includeInactive ?? false;

      // Inactive categories are always read so inactive parents can be recognized
      const [items, categories] = await Promise.all([
        this.fetchItems(),
        this.fetchCategories(),
      ]);

      if (items.length === 0 && categories.length === 0) {
        return success("Catalog has no categories or items to analyze", [], []);
      }

      const result = analyzeStructure({ categories, items, config: this.config, includeInactive });
      const message =
        result.recommendations.length === 0
          ? `No structural issues across ${categories.length} categories and ${items.length} items`
          : `${result.recommendations.length} structural issue(s) across ` +
            `${categories.length} categories and ${items.length} items`;
      return success(message, result.recommendations, result.warnings);
    });
  }

  // ── Internals ──

  private async guard<T>(body: () => Promise<OperationResult<T>>): Promise<OperationResult<T>> {
    try {
      return await body();
    } catch (err) {
      if (err instanceof ConfigurationError) return failure(err.message);
      if (err instanceof GatewayUnavailableError) {
        return failure(`Catalog data unavailable: ${err.message}`);
      }
      throw err;
    }
  }

  private resolve(spec: TimeWindowSpec | undefined): ResolvedWindow {
    return resolveWindow(spec ?? this.config.defaultWindow, this.now());
  }

  private resolveFamilies(names: readonly string[] | undefined): RuleFamily[] {
    if (names === undefined) return [...this.config.ruleFamilies];
    if (names.length === 0) {
      throw new ConfigurationError("rule_families", "must name at least one rule family");
    }
    return parseRuleFamilies(names);
  }

  /**
   * Items are always read in full so that event references outside the
   * requested category still resolve; scoping happens in memory.
   */
  private fetchItems(): Promise<CatalogItem[]> {
    return withDeadline("fetchItems", this.config.fetch.timeoutMs, (signal) =>
      this.gateway.fetchItems({ includeInactive: true, signal })
    );
  }

  private fetchCategories(): Promise<CatalogCategory[]> {
    return withDeadline("fetchCategories", this.config.fetch.timeoutMs, (signal) =>
      this.gateway.fetchCategories({ includeInactive: true, signal })
    );
  }

  /**
   * Read events slice by slice in parallel. A failed slice is a warning;
   * losing every slice fails the operation.
   */
  private async fetchEvents(
    window: ResolvedWindow,
    categoryId: RecordId | undefined
  ): Promise<{ events: OrderEvent[]; warnings: AnalysisWarning[] }> {
    const { timeoutMs, sliceDays } = this.config.fetch;
    const slices = sliceWindow(window, sliceDays);

    const settled = await Promise.allSettled(
      slices.map((slice) =>
        withDeadline(`fetchOrderEvents ${slice.label}`, timeoutMs, (signal) =>
          this.gateway.fetchOrderEvents({ window: slice, categoryId, signal })
        )
      )
    );

    const events: OrderEvent[] = [];
    const warnings: AnalysisWarning[] = [];
    let firstFailure: unknown = null;

    settled.forEach((outcome, index) => {
      if (outcome.status === "fulfilled") {
        events.push(...outcome.value);
        return;
      }
      firstFailure ??= outcome.reason;
      warnings.push({
        code: "slice_unavailable",
        message: `Order events for ${slices[index].label} unavailable: ${errorMessage(outcome.reason)}`,
      });
    });

    if (slices.length > 0 && warnings.length === slices.length) {
      throw new GatewayUnavailableError(
        `order events unavailable for every slice of ${window.label}: ${errorMessage(firstFailure)}`,
        { cause: firstFailure }
      );
    }

    return { events, warnings };
  }
}

function emptyReport(): RecommendationReport {
  return { recommendations: [], counts: {}, total: 0 };
}

function touchesCategory(
  recommendation: Recommendation,
  categoryId: RecordId,
  items: readonly CatalogItem[]
): boolean {
  if (recommendation.categoryIds.includes(categoryId)) return true;
  return recommendation.itemIds.some((id) =>
    items.some((item) => item.id === id && item.categoryId === categoryId)
  );
}
