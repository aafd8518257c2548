/**
 * MCP server over an in-memory transport, backed by fake catalog data.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, describe, expect, it } from "vitest";

import type { CatalogCategory, CatalogItem } from "../catalog/types.js";
import { DEFAULT_CONFIG } from "../config/schema.js";
import type {
  CatalogCategoryInput,
  CatalogCategoryUpdate,
  CatalogItemUpdate,
  CatalogRecordStore,
  ConnectionResult,
  ListOptions,
  MoveItemsResult,
} from "../connectors/types.js";
import { CatalogOptimizer } from "../optimizer.js";
import { CONFIG_URI, RULES_URI } from "../server/resources.js";
import { createCatalogServer } from "../server/server.js";
import { TOOL_NAMES } from "../server/tools.js";
import { FakeGateway, abandoned, category, item, ordered, times } from "./fixtures.js";

const JANUARY = { start: "2026-01-01T00:00:00Z", end: "2026-02-01T00:00:00Z" };

class FakeStore implements CatalogRecordStore {
  lastList: (ListOptions & { categoryId?: string }) | null = null;
  updates: Array<{ itemId: string; update: CatalogItemUpdate }> = [];
  created: CatalogCategoryInput[] = [];
  categoryUpdates: Array<{ categoryId: string; update: CatalogCategoryUpdate }> = [];

  constructor(private readonly items: CatalogItem[], private readonly categories: CatalogCategory[]) {}

  async listItems(options: ListOptions & { categoryId?: string }): Promise<CatalogItem[]> {
    this.lastList = options;
    return this.items.slice(options.offset, options.offset + options.limit);
  }

  async listCategories(options: ListOptions): Promise<CatalogCategory[]> {
    return this.categories.slice(options.offset, options.offset + options.limit);
  }

  async getItem(itemId: string): Promise<CatalogItem | null> {
    return this.items.find((i) => i.id === itemId) ?? null;
  }

  async updateItem(itemId: string, update: CatalogItemUpdate): Promise<CatalogItem | null> {
    this.updates.push({ itemId, update });
    const found = this.items.find((i) => i.id === itemId);
    if (!found) return null;
    if (itemId === "broken") throw new Error("upstream 500");
    return { ...found, ...update };
  }

  async createCategory(input: CatalogCategoryInput): Promise<CatalogCategory> {
    this.created.push(input);
    return category(`new_${this.created.length}`, {
      title: input.title,
      parentId: input.parentId ?? null,
    });
  }

  async updateCategory(categoryId: string, update: CatalogCategoryUpdate): Promise<CatalogCategory | null> {
    this.categoryUpdates.push({ categoryId, update });
    const found = this.categories.find((c) => c.id === categoryId);
    return found ? { ...found, ...update } : null;
  }

  async moveItems(itemIds: string[], targetCategoryId: string): Promise<MoveItemsResult> {
    const result: MoveItemsResult = { moved: [], failed: [] };
    for (const itemId of itemIds) {
      const moved = await this.updateItem(itemId, { categoryId: targetCategoryId });
      if (moved) result.moved.push(itemId);
      else result.failed.push({ itemId, error: "not found" });
    }
    return result;
  }

  async testConnection(): Promise<ConnectionResult> {
    return { success: true, message: "Connected" };
  }
}

const transports: InMemoryTransport[] = [];

afterEach(async () => {
  await Promise.all(transports.splice(0).map((t) => t.close()));
});

async function connect(store: CatalogRecordStore | null): Promise<Client> {
  const gateway = new FakeGateway(
    [item("a1", { name: "Standard Laptop" })],
    [category("cat_a", { title: "Hardware" })],
    [...times(3, () => ordered("a1")), ...times(3, () => abandoned("a1"))]
  );
  const server = createCatalogServer({
    optimizer: new CatalogOptimizer(gateway, { config: DEFAULT_CONFIG }),
    store,
  });
  const client = new Client({ name: "test-client", version: "1.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  transports.push(clientTransport, serverTransport);

  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  return client;
}

async function call(
  client: Client,
  name: string,
  args: Record<string, unknown> = {}
): Promise<{ isError: boolean; body: unknown }> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (first?.type !== "text") throw new Error(`${name} returned no text content`);
  return { isError: result.isError ?? false, body: JSON.parse(first.text) };
}

describe("tool discovery", () => {
  it("lists every catalog tool", async () => {
    const client = await connect(null);
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([...TOOL_NAMES].sort());
  });
});

describe("analysis tools", () => {
  it("returns usage snapshots in the result envelope", async () => {
    const client = await connect(null);
    const { isError, body } = await call(client, "catalog_analyze_usage", { time_window: JANUARY });

    expect(isError).toBe(false);
    expect(body).toMatchObject({
      success: true,
      message: "Usage for 1 item(s) from 6 order event(s) in 2026-01-01T00:00:00.000Z/2026-02-01T00:00:00.000Z",
      data: [{ itemId: "a1", orderCount: 3, abandonmentCount: 3, abandonmentRate: 0.5 }],
      warnings: [],
    });
  });

  it("returns ranked recommendations", async () => {
    const client = await connect(null);
    const { body } = await call(client, "catalog_get_recommendations", {
      time_window: JANUARY,
      rule_families: ["high_abandonment"],
    });

    expect(body).toMatchObject({
      success: true,
      data: {
        recommendations: [{ id: "high_abandonment:a1", impact: "high" }],
        counts: { high_abandonment: 1 },
        total: 1,
      },
    });
  });

  it("flags configuration errors", async () => {
    const client = await connect(null);
    const { isError, body } = await call(client, "catalog_get_recommendations", {
      rule_families: ["popularity"],
    });

    expect(isError).toBe(true);
    expect(body).toMatchObject({ success: false, data: null, warnings: [] });
  });

  it("analyzes structure", async () => {
    const client = await connect(null);
    const { body } = await call(client, "catalog_analyze_structure");
    expect(body).toMatchObject({
      success: true,
      message: "No structural issues across 1 categories and 1 items",
      data: [],
    });
  });
});

describe("record tools", () => {
  it("explain that ServiceNow is not configured", async () => {
    const client = await connect(null);
    const { isError, body } = await call(client, "catalog_list_items");

    expect(isError).toBe(true);
    expect(body).toEqual({
      success: false,
      message:
        "ServiceNow is not configured. Set SERVICENOW_INSTANCE_URL and credentials to use record tools.",
      data: null,
    });
  });

  it("list items with default paging", async () => {
    const store = new FakeStore([item("a1"), item("a2")], []);
    const client = await connect(store);
    const { body } = await call(client, "catalog_list_items", { query: "laptop" });

    expect(store.lastList).toEqual({
      limit: 100,
      offset: 0,
      query: "laptop",
      activeOnly: true,
      categoryId: undefined,
    });
    expect(body).toMatchObject({
      success: true,
      message: "Found 2 catalog item(s)",
      data: { count: 2, limit: 100, offset: 0 },
    });
  });

  it("list categories", async () => {
    const store = new FakeStore([], [category("c1", { title: "Hardware" })]);
    const client = await connect(store);
    const { body } = await call(client, "catalog_list_categories");
    expect(body).toMatchObject({ success: true, message: "Found 1 catalog category" });
  });

  it("update only the given fields", async () => {
    const store = new FakeStore([item("a1")], []);
    const client = await connect(store);
    const { isError, body } = await call(client, "catalog_update_item", {
      item_id: "a1",
      short_description: "Laptop for office work and travel",
      active: false,
    });

    expect(isError).toBe(false);
    expect(store.updates).toEqual([
      { itemId: "a1", update: { shortDescription: "Laptop for office work and travel", active: false } },
    ]);
    expect(body).toMatchObject({
      success: true,
      message: "Updated catalog item a1: shortDescription, active",
      data: { id: "a1", active: false },
    });
  });

  it("refuse an empty update", async () => {
    const store = new FakeStore([item("a1")], []);
    const client = await connect(store);
    const { isError, body } = await call(client, "catalog_update_item", { item_id: "a1" });

    expect(isError).toBe(true);
    expect(body).toMatchObject({ message: "No fields to update" });
    expect(store.updates).toEqual([]);
  });

  it("report a missing item and an upstream failure", async () => {
    const store = new FakeStore([item("broken")], []);
    const client = await connect(store);

    const missing = await call(client, "catalog_update_item", { item_id: "nope", name: "X" });
    expect(missing.body).toMatchObject({ success: false, message: "Catalog item nope not found" });

    const broken = await call(client, "catalog_update_item", { item_id: "broken", name: "X" });
    expect(broken.body).toMatchObject({
      success: false,
      message: "Failed to update catalog item broken: upstream 500",
    });
  });
});

describe("category and item maintenance tools", () => {
  it("read one item", async () => {
    const store = new FakeStore([item("a1", { name: "Standard Laptop" })], []);
    const client = await connect(store);

    const found = await call(client, "catalog_get_item", { item_id: "a1" });
    expect(found.isError).toBe(false);
    expect(found.body).toMatchObject({
      success: true,
      message: "Catalog item a1",
      data: { id: "a1", name: "Standard Laptop" },
    });

    const missing = await call(client, "catalog_get_item", { item_id: "nope" });
    expect(missing.isError).toBe(true);
    expect(missing.body).toMatchObject({ message: "Catalog item nope not found" });
  });

  it("create a top-level category", async () => {
    const store = new FakeStore([], []);
    const client = await connect(store);
    const { isError, body } = await call(client, "catalog_create_category", {
      title: "Peripherals",
      parent_id: "",
    });

    expect(isError).toBe(false);
    expect(store.created).toEqual([{ title: "Peripherals", parentId: null }]);
    expect(body).toMatchObject({
      success: true,
      message: "Created catalog category new_1: Peripherals",
      data: { id: "new_1", title: "Peripherals", parentId: null },
    });
  });

  it("update a category and clear its parent", async () => {
    const store = new FakeStore([], [category("c1", { title: "Hardware", parentId: "root" })]);
    const client = await connect(store);
    const { body } = await call(client, "catalog_update_category", {
      category_id: "c1",
      title: "Devices",
      parent_id: "",
    });

    expect(store.categoryUpdates).toEqual([{ categoryId: "c1", update: { title: "Devices", parentId: null } }]);
    expect(body).toMatchObject({
      success: true,
      message: "Updated catalog category c1: title, parentId",
      data: { id: "c1", title: "Devices", parentId: null },
    });
  });

  it("refuse to make a category its own parent", async () => {
    const store = new FakeStore([], [category("c1")]);
    const client = await connect(store);

    const self = await call(client, "catalog_update_category", { category_id: "c1", parent_id: "c1" });
    expect(self.body).toMatchObject({ success: false, message: "Catalog category c1 cannot be its own parent" });

    const empty = await call(client, "catalog_update_category", { category_id: "c1" });
    expect(empty.body).toMatchObject({ success: false, message: "No fields to update" });

    const missing = await call(client, "catalog_update_category", { category_id: "nope", order: 5 });
    expect(missing.body).toMatchObject({ success: false, message: "Catalog category nope not found" });

    expect(store.categoryUpdates).toEqual([{ categoryId: "nope", update: { order: 5 } }]);
  });

  it("move items and list the ones that failed", async () => {
    const store = new FakeStore([item("a1"), item("a2")], []);
    const client = await connect(store);
    const { isError, body } = await call(client, "catalog_move_items", {
      item_ids: ["a1", "ghost", "a2"],
      target_category_id: "cat_b",
    });

    expect(isError).toBe(false);
    expect(body).toEqual({
      success: true,
      message: "Moved 2 of 3 catalog item(s) to cat_b; 1 failed",
      data: { moved: ["a1", "a2"], failed: [{ itemId: "ghost", error: "not found" }] },
    });
  });

  it("report a move in which nothing moved", async () => {
    const store = new FakeStore([item("a1")], []);
    const client = await connect(store);

    const all = await call(client, "catalog_move_items", { item_ids: ["a1"], target_category_id: "cat_b" });
    expect(all.body).toMatchObject({ success: true, message: "Moved 1 catalog item(s) to cat_b" });

    const none = await call(client, "catalog_move_items", { item_ids: ["ghost"], target_category_id: "cat_b" });
    expect(none.isError).toBe(true);
    expect(none.body).toMatchObject({ success: false, message: "Failed to move any catalog items" });
  });

  it("need a configured instance", async () => {
    const client = await connect(null);
    const { isError, body } = await call(client, "catalog_move_items", {
      item_ids: ["a1"],
      target_category_id: "cat_b",
    });
    expect(isError).toBe(true);
    expect(body).toMatchObject({ success: false, data: null });
  });
});

describe("resources", () => {
  it("lists the rules and config resources", async () => {
    const client = await connect(null);
    const { resources } = await client.listResources();
    expect(resources.map((r) => r.uri)).toEqual([RULES_URI, CONFIG_URI]);
  });

  it("describes rules with their thresholds", async () => {
    const client = await connect(null);
    const { contents } = await client.readResource({ uri: RULES_URI });
    const text = "text" in contents[0] ? String(contents[0].text) : "";

    expect(contents[0].mimeType).toBe("text/markdown");
    expect(text).toContain("## High Abandonment (high_abandonment)\n");
    expect(text).toContain("Fires when: abandonment rate >= 0.5 with at least 5 ordered or abandoned requests\n");
    expect(text).toContain("# Catalog Structure Checks\n");
  });

  it("serves the effective configuration", async () => {
    const client = await connect(null);
    const { contents } = await client.readResource({ uri: CONFIG_URI });
    const text = "text" in contents[0] ? String(contents[0].text) : "";
    expect(JSON.parse(text)).toEqual(JSON.parse(JSON.stringify(DEFAULT_CONFIG)));
  });
});
