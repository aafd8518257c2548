/**
 * Catalog Gateway Interface
 *
 * The optimizer never touches a platform API directly. It reads catalog
 * snapshots through this contract, which the ServiceNow gateway and the
 * in-process test fakes implement.
 *
 * Every method receives an AbortSignal; implementations must stop work
 * and reject once it fires. Retrying is the gateway's own business.
 */

import type {
  CatalogCategory,
  CatalogItem,
  OrderEvent,
  RecordId,
  ResolvedWindow,
} from "../catalog/types.js";

export interface ConnectionResult {
  success: boolean;
  message: string;
}

export interface FetchItemsOptions {
  categoryId?: RecordId;
  includeInactive: boolean;
  signal?: AbortSignal;
}

export interface FetchCategoriesOptions {
  includeInactive: boolean;
  signal?: AbortSignal;
}

export interface FetchOrderEventsOptions {
  window: ResolvedWindow;
  categoryId?: RecordId;
  signal?: AbortSignal;
}

/**
 * Read-only access to catalog structure and order telemetry.
 */
export interface CatalogGateway {
  fetchItems(options: FetchItemsOptions): Promise<CatalogItem[]>;
  fetchCategories(options: FetchCategoriesOptions): Promise<CatalogCategory[]>;
  /** Events whose timestamp falls inside [window.start, window.end) */
  fetchOrderEvents(options: FetchOrderEventsOptions): Promise<OrderEvent[]>;
}

/**
 * Fields a caller may change on a catalog item. Omitted fields are left alone.
 */
export interface CatalogItemUpdate {
  name?: string;
  shortDescription?: string;
  description?: string;
  categoryId?: RecordId;
  price?: string;
  active?: boolean;
  order?: number;
}

export interface CatalogCategoryInput {
  title: string;
  description?: string;
  /** null places the category at the top level */
  parentId?: RecordId | null;
  active?: boolean;
  order?: number;
}

export type CatalogCategoryUpdate = Partial<CatalogCategoryInput>;

export interface MoveItemsResult {
  moved: RecordId[];
  failed: Array<{ itemId: RecordId; error: string }>;
}

export interface ListOptions {
  limit: number;
  offset: number;
  /** Text matched against names and short descriptions */
  query?: string;
  activeOnly: boolean;
  signal?: AbortSignal;
}

/**
 * Record operations the MCP layer offers next to the analysis tools.
 */
export interface CatalogRecordStore {
  listItems(options: ListOptions & { categoryId?: RecordId }): Promise<CatalogItem[]>;
  listCategories(options: ListOptions): Promise<CatalogCategory[]>;
  getItem(itemId: RecordId): Promise<CatalogItem | null>;
  updateItem(itemId: RecordId, update: CatalogItemUpdate): Promise<CatalogItem | null>;
  createCategory(input: CatalogCategoryInput): Promise<CatalogCategory>;
  updateCategory(categoryId: RecordId, update: CatalogCategoryUpdate): Promise<CatalogCategory | null>;
  /** Items are moved one at a time; a failure does not stop the rest */
  moveItems(itemIds: RecordId[], targetCategoryId: RecordId): Promise<MoveItemsResult>;
  testConnection(): Promise<ConnectionResult>;
}
