/**
 * MCP Tool Handlers: the analysis operations plus the catalog record
 * operations, registered on an McpServer with zod input shapes.
 *
 * Every tool answers with the same JSON envelope: success, message, data
 * (and warnings for the analysis tools). Failures set isError.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import { errorMessage } from "../catalog/errors.js";
import { RULE_FAMILIES } from "../catalog/types.js";
import { TimeWindowSchema } from "../config/schema.js";
import type {
  CatalogCategoryUpdate,
  CatalogItemUpdate,
  CatalogRecordStore,
} from "../connectors/types.js";
import type { CatalogOptimizer } from "../optimizer.js";

export interface ToolDependencies {
  optimizer: CatalogOptimizer;
  /** Record operations; null when no ServiceNow instance is configured */
  store: CatalogRecordStore | null;
}

export const TOOL_NAMES = [
  "catalog_analyze_usage",
  "catalog_get_recommendations",
  "catalog_analyze_structure",
  "catalog_list_items",
  "catalog_list_categories",
  "catalog_get_item",
  "catalog_update_item",
  "catalog_create_category",
  "catalog_update_category",
  "catalog_move_items",
] as const;

const NOT_CONFIGURED =
  "ServiceNow is not configured. Set SERVICENOW_INSTANCE_URL and credentials to use record tools.";

function respond(result: { success: boolean; message: string; data: unknown }) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
    isError: !result.success,
  };
}

function recordFailure(message: string) {
  return respond({ success: false, message, data: null });
}

const timeWindow = TimeWindowSchema.optional().describe(
  "Named window (last_7_days, last_30_days, last_90_days, last_year) or { start, end } ISO timestamps. " +
    "Defaults to the configured window."
);

const listShape = {
  limit: z.number().int().min(1).max(1000).default(100).describe("Maximum records to return"),
  offset: z.number().int().min(0).default(0).describe("Records to skip"),
  query: z.string().optional().describe("Text to match against names and descriptions"),
  active_only: z.boolean().default(true).describe("Only return active records"),
};

export function registerTools(server: McpServer, deps: ToolDependencies): void {
  const { optimizer, store } = deps;

  // ── Analysis ──

  server.tool(
    "catalog_analyze_usage",
    "Per-item usage metrics for a time window: order and abandonment counts, abandonment rate, " +
      "fulfillment time and approval rate. Items without orders are omitted unless include_inactive is set.",
    {
      time_window: timeWindow,
      category_id: z.string().optional().describe("Restrict to items in this category (sys_id)"),
      include_inactive: z
        .boolean()
        .default(false)
        .describe("Report every in-scope item, including those with zero usage"),
    },
    async ({ time_window, category_id, include_inactive }) =>
      respond(
        await optimizer.analyzeUsage({
          timeWindow: time_window,
          categoryId: category_id,
          includeInactive: include_inactive,
        })
      )
  );

  server.tool(
    "catalog_get_recommendations",
    "Ranked optimization recommendations for the service catalog, with per-type counts. " +
      "Read catalog://rules for the thresholds behind each rule family.",
    {
      category_id: z.string().optional().describe("Restrict to items in this category (sys_id)"),
      rule_families: z
        .array(z.string())
        .optional()
        .describe(`Rule families to run: ${RULE_FAMILIES.join(", ")}. Defaults to the configured set.`),
      time_window: timeWindow,
      include_structure: z
        .boolean()
        .default(false)
        .describe("Merge structural findings (category sizes, nesting, naming, duplicates)"),
    },
    async ({ category_id, rule_families, time_window, include_structure }) =>
      respond(
        await optimizer.getRecommendations({
          categoryId: category_id,
          ruleFamilies: rule_families,
          timeWindow: time_window,
          includeStructure: include_structure,
        })
      )
  );

  server.tool(
    "catalog_analyze_structure",
    "Structural defects in the category tree and item set: category size imbalance, deep nesting, " +
      "naming inconsistencies, possible duplicate items, orphaned categories and parent cycles.",
    {
      include_inactive: z
        .boolean()
        .default(false)
        .describe("Also analyze inactive categories and items"),
    },
    async ({ include_inactive }) =>
      respond(await optimizer.analyzeStructure({ includeInactive: include_inactive }))
  );

  // ── Records ──

  server.tool(
    "catalog_list_items",
    "List service catalog items with optional text and category filters.",
    {
      ...listShape,
      category_id: z.string().optional().describe("Only items in this category (sys_id)"),
    },
    async ({ limit, offset, query, active_only, category_id }) => {
      if (!store) return recordFailure(NOT_CONFIGURED);
      try {
        const items = await store.listItems({
          limit,
          offset,
          query,
          activeOnly: active_only,
          categoryId: category_id,
        });
        return respond({
          success: true,
          message: `Found ${items.length} catalog item(s)`,
          data: { items, count: items.length, limit, offset },
        });
      } catch (err) {
        return recordFailure(`Failed to list catalog items: ${errorMessage(err)}`);
      }
    }
  );

  server.tool(
    "catalog_list_categories",
    "List service catalog categories with optional text filter.",
    listShape,
    async ({ limit, offset, query, active_only }) => {
      if (!store) return recordFailure(NOT_CONFIGURED);
      try {
        const categories = await store.listCategories({
          limit,
          offset,
          query,
          activeOnly: active_only,
        });
        return respond({
          success: true,
          message: `Found ${categories.length} catalog categor${categories.length === 1 ? "y" : "ies"}`,
          data: { categories, count: categories.length, limit, offset },
        });
      } catch (err) {
        return recordFailure(`Failed to list catalog categories: ${errorMessage(err)}`);
      }
    }
  );

  server.tool(
    "catalog_get_item",
    "Read one catalog item by sys_id.",
    { item_id: z.string().min(1).describe("Catalog item sys_id") },
    async ({ item_id }) => {
      if (!store) return recordFailure(NOT_CONFIGURED);
      try {
        const item = await store.getItem(item_id);
        if (!item) return recordFailure(`Catalog item ${item_id} not found`);
        return respond({ success: true, message: `Catalog item ${item_id}`, data: item });
      } catch (err) {
        return recordFailure(`Failed to read catalog item ${item_id}: ${errorMessage(err)}`);
      }
    }
  );

  server.tool(
    "catalog_update_item",
    "Update fields of a catalog item, typically to act on a recommendation " +
      "(rewrite a description, deactivate an unused item, move it to another category).",
    {
      item_id: z.string().min(1).describe("Catalog item sys_id"),
      name: z.string().optional(),
      short_description: z.string().optional(),
      description: z.string().optional(),
      category_id: z.string().optional().describe("New category sys_id"),
      price: z.string().optional(),
      active: z.boolean().optional(),
      order: z.number().int().optional(),
    },
    async ({ item_id, name, short_description, description, category_id, price, active, order }) => {
      if (!store) return recordFailure(NOT_CONFIGURED);

      const update: CatalogItemUpdate = {};
      if (name !== undefined) update.name = name;
      if (short_description !== undefined) update.shortDescription = short_description;
      if (description !== undefined) update.description = description;
      if (category_id !== undefined) update.categoryId = category_id;
      if (price !== undefined) update.price = price;
      if (active !== undefined) update.active = active;
      if (order !== undefined) update.order = order;

      if (Object.keys(update).length === 0) {
        return recordFailure("No fields to update");
      }

      try {
        const item = await store.updateItem(item_id, update);
        if (!item) return recordFailure(`Catalog item ${item_id} not found`);
        return respond({
          success: true,
          message: `Updated catalog item ${item_id}: ${Object.keys(update).join(", ")}`,
          data: item,
        });
      } catch (err) {
        return recordFailure(`Failed to update catalog item ${item_id}: ${errorMessage(err)}`);
      }
    }
  );

  const categoryFields = {
    description: z.string().optional(),
    parent_id: z
      .string()
      .optional()
      .describe('Parent category sys_id; "" places the category at the top level'),
    active: z.boolean().optional(),
    order: z.number().int().optional(),
  };

  server.tool(
    "catalog_create_category",
    "Create a catalog category, for example to split an overfull one.",
    { title: z.string().min(1).describe("Category title"), ...categoryFields },
    async ({ title, description, parent_id, active, order }) => {
      if (!store) return recordFailure(NOT_CONFIGURED);
      try {
        const category = await store.createCategory({
          title,
          description,
          parentId: parent_id === undefined ? undefined : parent_id || null,
          active,
          order,
        });
        return respond({
          success: true,
          message: `Created catalog category ${category.id}: ${category.title}`,
          data: category,
        });
      } catch (err) {
        return recordFailure(`Failed to create catalog category: ${errorMessage(err)}`);
      }
    }
  );

  server.tool(
    "catalog_update_category",
    "Update fields of a catalog category: rename it, re-parent it or deactivate it.",
    {
      category_id: z.string().min(1).describe("Catalog category sys_id"),
      title: z.string().min(1).optional(),
      ...categoryFields,
    },
    async ({ category_id, title, description, parent_id, active, order }) => {
      if (!store) return recordFailure(NOT_CONFIGURED);

      const update: CatalogCategoryUpdate = {};
      if (title !== undefined) update.title = title;
      if (description !== undefined) update.description = description;
      if (parent_id !== undefined) update.parentId = parent_id || null;
      if (active !== undefined) update.active = active;
      if (order !== undefined) update.order = order;

      if (Object.keys(update).length === 0) {
        return recordFailure("No fields to update");
      }
      if (update.parentId === category_id) {
        return recordFailure(`Catalog category ${category_id} cannot be its own parent`);
      }

      try {
        const category = await store.updateCategory(category_id, update);
        if (!category) return recordFailure(`Catalog category ${category_id} not found`);
        return respond({
          success: true,
          message: `Updated catalog category ${category_id}: ${Object.keys(update).join(", ")}`,
          data: category,
        });
      } catch (err) {
        return recordFailure(`Failed to update catalog category ${category_id}: ${errorMessage(err)}`);
      }
    }
  );

  server.tool(
    "catalog_move_items",
    "Move catalog items into another category. Each item is moved on its own; " +
      "failures are listed without undoing the items already moved.",
    {
      item_ids: z.array(z.string().min(1)).min(1).describe("Catalog item sys_ids"),
      target_category_id: z.string().min(1).describe("Destination category sys_id"),
    },
    async ({ item_ids, target_category_id }) => {
      if (!store) return recordFailure(NOT_CONFIGURED);
      try {
        const result = await store.moveItems(item_ids, target_category_id);
        const { moved, failed } = result;
        if (moved.length === 0) {
          return respond({ success: false, message: "Failed to move any catalog items", data: result });
        }
        const message =
          failed.length === 0
            ? `Moved ${moved.length} catalog item(s) to ${target_category_id}`
            : `Moved ${moved.length} of ${item_ids.length} catalog item(s) to ${target_category_id}; ` +
              `${failed.length} failed`;
        return respond({ success: true, message, data: result });
      } catch (err) {
        return recordFailure(`Failed to move catalog items: ${errorMessage(err)}`);
      }
    }
  );
}
