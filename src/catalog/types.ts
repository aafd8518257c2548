/**
 * Core type system for the catalog optimizer.
 *
 * Catalog records are read-only snapshots supplied by a gateway.
 * Everything derived from them (snapshots, recommendations, warnings)
 * is a value object owned by the analysis run that produced it.
 */

/**
 * Identifier of a catalog item or category (a ServiceNow sys_id).
 */
export type RecordId = string;

/**
 * A requestable item in the service catalog (sc_cat_item).
 */
export interface CatalogItem {
  id: RecordId;
  name: string;
  shortDescription: string;
  description: string;
  /** Owning category, null when the item is uncategorized */
  categoryId: RecordId | null;
  active: boolean;
  order: number;
  /** Price as the platform reports it; opaque to the engine */
  price: string | number | null;
}

/**
 * A catalog category (sc_category). Categories form a tree through parentId.
 */
export interface CatalogCategory {
  id: RecordId;
  title: string;
  description: string;
  /** Parent category, null for a root */
  parentId: RecordId | null;
  active: boolean;
  order: number;
}

export type OrderOutcome = "ordered" | "abandoned";

export type ApprovalOutcome = "approved" | "rejected" | "n/a";

/**
 * One ordering attempt for a catalog item.
 */
export interface OrderEvent {
  itemId: RecordId;
  timestamp: Date;
  outcome: OrderOutcome;
  /** Hours from order to completion; only set for completed orders */
  fulfillmentHours: number | null;
  approval: ApprovalOutcome | null;
}

/**
 * Named analysis windows, all ending at the time of the run.
 */
export type NamedTimeWindow =
  | "last_7_days"
  | "last_30_days"
  | "last_90_days"
  | "last_year";

/**
 * An explicit window given as ISO-8601 timestamps.
 */
export interface ExplicitTimeWindow {
  start: string;
  end: string;
}

export type TimeWindowSpec = NamedTimeWindow | ExplicitTimeWindow;

/**
 * A window resolved to concrete bounds: [start, end).
 */
export interface ResolvedWindow {
  label: string;
  start: Date;
  end: Date;
}

/**
 * Usage metrics for one item over one window.
 *
 * The optional fields are left off entirely when no event qualifies,
 * so "no completed fulfillments" never reads as "instant fulfillment".
 */
export interface UsageMetricSnapshot {
  itemId: RecordId;
  window: ResolvedWindow;
  orderCount: number;
  abandonmentCount: number;
  /** ordered + abandoned events */
  sampleSize: number;
  /** abandoned / sampleSize, 0 when sampleSize is 0 */
  abandonmentRate: number;
  meanFulfillmentHours?: number;
  medianFulfillmentHours?: number;
  /** approved / (approved + rejected) */
  approvalRate?: number;
}

/**
 * Qualitative score used for both impact and effort.
 */
export enum Level {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
}

export const RULE_FAMILIES = [
  "inactive_items",
  "low_usage",
  "high_abandonment",
  "slow_fulfillment",
  "description_quality",
] as const;

/**
 * Usage-driven recommendation families evaluated by the rules engine.
 */
export type RuleFamily = (typeof RULE_FAMILIES)[number];

export const STRUCTURAL_DEFECTS = [
  "too_few_items",
  "too_many_items",
  "deep_nesting",
  "naming_inconsistency",
  "possible_duplicate",
  "orphaned_category",
  "category_cycle",
] as const;

/**
 * Defects found by the structure analyzer without looking at usage.
 */
export type StructuralDefect = (typeof STRUCTURAL_DEFECTS)[number];

export type RecommendationType = RuleFamily | StructuralDefect;

export function isRuleFamily(value: string): value is RuleFamily {
  return (RULE_FAMILIES as readonly string[]).includes(value);
}

export function isStructuralDefect(value: string): value is StructuralDefect {
  return (STRUCTURAL_DEFECTS as readonly string[]).includes(value);
}

/**
 * A single actionable finding.
 */
export interface Recommendation {
  /** Stable key: `<type>:<subject>` */
  id: string;
  type: RecommendationType;
  title: string;
  description: string;
  /** What the catalog owner should do about it */
  action: string;
  impact: Level;
  effort: Level;
  itemIds: RecordId[];
  categoryIds: RecordId[];
  /** The figures that triggered the finding */
  evidence: Record<string, string | number | boolean>;
}

export type WarningCode =
  | "orphaned_item_reference"
  | "orphaned_category"
  | "category_cycle"
  | "missing_item_metadata"
  | "slice_unavailable";

/**
 * A non-fatal data-quality problem met during a run.
 */
export interface AnalysisWarning {
  code: WarningCode;
  message: string;
  subjectId?: RecordId;
}

/**
 * Envelope returned by every top-level operation.
 */
export interface OperationResult<T> {
  success: boolean;
  message: string;
  data: T | null;
  warnings: AnalysisWarning[];
}
