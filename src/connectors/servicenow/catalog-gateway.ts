/**
 * ServiceNow Catalog Gateway
 *
 * Maps the service catalog tables onto the optimizer's record types:
 *
 *   sc_cat_item   -> CatalogItem
 *   sc_category   -> CatalogCategory
 *   sc_req_item   -> "ordered" OrderEvent
 *   sc_cart_item  -> "abandoned" OrderEvent (left in a cart, never submitted)
 *
 * ServiceNow date-times ("YYYY-MM-DD HH:MM:SS") are read as UTC.
 */

import type {
  ApprovalOutcome,
  CatalogCategory,
  CatalogItem,
  OrderEvent,
  RecordId,
} from "../../catalog/types.js";
import type {
  CatalogCategoryInput,
  CatalogCategoryUpdate,
  CatalogGateway,
  CatalogItemUpdate,
  CatalogRecordStore,
  ConnectionResult,
  FetchCategoriesOptions,
  FetchItemsOptions,
  FetchOrderEventsOptions,
  ListOptions,
  MoveItemsResult,
} from "../types.js";
import { fieldText } from "./client.js";
import type { ServiceNowConnector, ServiceNowRecord } from "./client.js";

const ITEM_FIELDS = [
  "sys_id",
  "name",
  "short_description",
  "description",
  "category",
  "active",
  "order",
  "price",
];

const CATEGORY_FIELDS = ["sys_id", "title", "description", "parent", "active", "order"];

const REQUEST_ITEM_FIELDS = ["sys_id", "cat_item", "opened_at", "closed_at", "state", "approval"];

const CART_ITEM_FIELDS = ["sys_id", "cat_item", "sys_created_on"];

/** sc_req_item state "Closed Complete" */
const STATE_CLOSED_COMPLETE = "3";

const HOUR_MS = 3_600_000;

// ── Value conversion ───────────────────────────────────────────

export function toServiceNowDateTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

export function parseServiceNowDateTime(value: string): Date | null {
  const text = value.trim();
  if (!text) return null;
  const iso = text.includes("T") ? text : text.replace(" ", "T");
  const zoned = /(Z|[+-]\d{2}:\d{2})$/.test(iso) ? iso : `${iso}Z`;
  const date = new Date(zoned);
  return Number.isNaN(date.getTime()) ? null : date;
}

function toBoolean(value: string): boolean {
  return value === "true" || value === "1";
}

function toInteger(value: string): number {
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

function toApproval(value: string): ApprovalOutcome {
  if (value === "approved") return "approved";
  if (value === "rejected") return "rejected";
  return "n/a";
}

export function toCatalogItem(record: ServiceNowRecord): CatalogItem {
  const price = fieldText(record, "price");
  return {
    id: fieldText(record, "sys_id"),
    name: fieldText(record, "name"),
    shortDescription: fieldText(record, "short_description"),
    description: fieldText(record, "description"),
    categoryId: fieldText(record, "category") || null,
    active: toBoolean(fieldText(record, "active")),
    order: toInteger(fieldText(record, "order")),
    price: price === "" ? null : price,
  };
}

export function toCatalogCategory(record: ServiceNowRecord): CatalogCategory {
  return {
    id: fieldText(record, "sys_id"),
    title: fieldText(record, "title"),
    description: fieldText(record, "description"),
    parentId: fieldText(record, "parent") || null,
    active: toBoolean(fieldText(record, "active")),
    order: toInteger(fieldText(record, "order")),
  };
}

/**
 * Rows without an item reference or a readable open time are dropped.
 */
export function toOrderedEvent(record: ServiceNowRecord): OrderEvent | null {
  const itemId = fieldText(record, "cat_item");
  const opened = parseServiceNowDateTime(fieldText(record, "opened_at"));
  if (!itemId || !opened) return null;

  let fulfillmentHours: number | null = null;
  if (fieldText(record, "state") === STATE_CLOSED_COMPLETE) {
    const closed = parseServiceNowDateTime(fieldText(record, "closed_at"));
    if (closed && closed.getTime() >= opened.getTime()) {
      fulfillmentHours = (closed.getTime() - opened.getTime()) / HOUR_MS;
    }
  }

  return {
    itemId,
    timestamp: opened,
    outcome: "ordered",
    fulfillmentHours,
    approval: toApproval(fieldText(record, "approval")),
  };
}

export function toAbandonedEvent(record: ServiceNowRecord): OrderEvent | null {
  const itemId = fieldText(record, "cat_item");
  const created = parseServiceNowDateTime(fieldText(record, "sys_created_on"));
  if (!itemId || !created) return null;
  return { itemId, timestamp: created, outcome: "abandoned", fulfillmentHours: null, approval: null };
}

function joinQuery(...parts: Array<string | undefined>): string {
  return parts.filter((p): p is string => Boolean(p)).join("^");
}

function toCategoryBody(update: CatalogCategoryUpdate): Record<string, string | number | boolean> {
  const body: Record<string, string | number | boolean> = {};
  if (update.title !== undefined) body.title = update.title;
  if (update.description !== undefined) body.description = update.description;
  if (update.parentId !== undefined) body.parent = update.parentId ?? "";
  if (update.active !== undefined) body.active = update.active;
  if (update.order !== undefined) body.order = update.order;
  return body;
}

function isPresent<T>(value: T | null): value is T {
  return value !== null;
}

// ── Gateway ────────────────────────────────────────────────────

export class ServiceNowCatalogGateway implements CatalogGateway, CatalogRecordStore {
  constructor(private readonly connector: ServiceNowConnector) {}

  async fetchItems(options: FetchItemsOptions): Promise<CatalogItem[]> {
    const records = await this.connector.queryAll("sc_cat_item", {
      query: joinQuery(
        options.includeInactive ? undefined : "active=true",
        options.categoryId ? `category=${options.categoryId}` : undefined,
        "ORDERBYsys_id"
      ),
      fields: ITEM_FIELDS,
      signal: options.signal,
    });
    return records.map(toCatalogItem);
  }

  async fetchCategories(options: FetchCategoriesOptions): Promise<CatalogCategory[]> {
    const records = await this.connector.queryAll("sc_category", {
      query: joinQuery(options.includeInactive ? undefined : "active=true", "ORDERBYsys_id"),
      fields: CATEGORY_FIELDS,
      signal: options.signal,
    });
    return records.map(toCatalogCategory);
  }

  async fetchOrderEvents(options: FetchOrderEventsOptions): Promise<OrderEvent[]> {
    const start = toServiceNowDateTime(options.window.start);
    const end = toServiceNowDateTime(options.window.end);
    const categoryClause = options.categoryId
      ? `cat_item.category=${options.categoryId}`
      : undefined;

    const [requested, carts] = await Promise.all([
      this.connector.queryAll("sc_req_item", {
        query: joinQuery(`opened_at>=${start}`, `opened_at<${end}`, categoryClause, "ORDERBYsys_id"),
        fields: REQUEST_ITEM_FIELDS,
        signal: options.signal,
      }),
      this.connector.queryAll("sc_cart_item", {
        query: joinQuery(
          `sys_created_on>=${start}`,
          `sys_created_on<${end}`,
          categoryClause,
          "ORDERBYsys_id"
        ),
        fields: CART_ITEM_FIELDS,
        signal: options.signal,
      }),
    ]);

    return [
      ...requested.map(toOrderedEvent).filter(isPresent),
      ...carts.map(toAbandonedEvent).filter(isPresent),
    ];
  }

  // ── Record operations ──

  async listItems(options: ListOptions & { categoryId?: RecordId }): Promise<CatalogItem[]> {
    const records = await this.connector.queryTable("sc_cat_item", {
      query: joinQuery(
        options.activeOnly ? "active=true" : undefined,
        options.categoryId ? `category=${options.categoryId}` : undefined,
        options.query
          ? `nameLIKE${options.query}^ORshort_descriptionLIKE${options.query}`
          : undefined,
        "ORDERBYname"
      ),
      fields: ITEM_FIELDS,
      limit: options.limit,
      offset: options.offset,
      signal: options.signal,
    });
    return records.map(toCatalogItem);
  }

  async listCategories(options: ListOptions): Promise<CatalogCategory[]> {
    const records = await this.connector.queryTable("sc_category", {
      query: joinQuery(
        options.activeOnly ? "active=true" : undefined,
        options.query ? `titleLIKE${options.query}^ORdescriptionLIKE${options.query}` : undefined,
        "ORDERBYtitle"
      ),
      fields: CATEGORY_FIELDS,
      limit: options.limit,
      offset: options.offset,
      signal: options.signal,
    });
    return records.map(toCatalogCategory);
  }

  async updateItem(itemId: RecordId, update: CatalogItemUpdate): Promise<CatalogItem | null> {
    const body: Record<string, string | number | boolean> = {};
    if (update.name !== undefined) body.name = update.name;
    if (update.shortDescription !== undefined) body.short_description = update.shortDescription;
    if (update.description !== undefined) body.description = update.description;
    if (update.categoryId !== undefined) body.category = update.categoryId;
    if (update.price !== undefined) body.price = update.price;
    if (update.active !== undefined) body.active = update.active;
    if (update.order !== undefined) body.order = update.order;

    const record = await this.connector.updateRecord("sc_cat_item", itemId, body);
    return record ? toCatalogItem(record) : null;
  }

  async getItem(itemId: RecordId): Promise<CatalogItem | null> {
    const record = await this.connector.getRecord("sc_cat_item", itemId, { fields: ITEM_FIELDS });
    return record ? toCatalogItem(record) : null;
  }

  async createCategory(input: CatalogCategoryInput): Promise<CatalogCategory> {
    const record = await this.connector.createRecord("sc_category", toCategoryBody(input));
    return toCatalogCategory(record);
  }

  async updateCategory(
    categoryId: RecordId,
    update: CatalogCategoryUpdate
  ): Promise<CatalogCategory | null> {
    const record = await this.connector.updateRecord("sc_category", categoryId, toCategoryBody(update));
    return record ? toCatalogCategory(record) : null;
  }

  async moveItems(itemIds: RecordId[], targetCategoryId: RecordId): Promise<MoveItemsResult> {
    const result: MoveItemsResult = { moved: [], failed: [] };
    for (const itemId of itemIds) {
      try {
        const moved = await this.updateItem(itemId, { categoryId: targetCategoryId });
        if (moved) {
          result.moved.push(itemId);
        } else {
          result.failed.push({ itemId, error: "not found" });
        }
      } catch (error) {
        result.failed.push({ itemId, error: error instanceof Error ? error.message : String(error) });
      }
    }
    return result;
  }

  testConnection(): Promise<ConnectionResult> {
    return this.connector.testConnection();
  }
}
