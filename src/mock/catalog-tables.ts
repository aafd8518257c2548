/**
 * Mock catalog tables and a small encoded-query evaluator, enough of the
 * Table API for the gateway's queries to behave as on a real instance.
 *
 * The seed describes order history relative to "now" so the data always
 * falls inside the default analysis window.
 */

import { z } from "zod";

export type MockRecord = Record<string, string>;

export type CatalogTable = "sc_category" | "sc_cat_item" | "sc_req_item" | "sc_cart_item";

export type MockTables = Record<CatalogTable, MockRecord[]>;

const SeedSchema = z.object({
  categories: z.array(
    z.object({
      sys_id: z.string(),
      title: z.string(),
      description: z.string().default(""),
      parent: z.string().default(""),
      active: z.boolean().default(true),
      order: z.number().int().default(100),
    })
  ),
  items: z.array(
    z.object({
      sys_id: z.string(),
      name: z.string(),
      short_description: z.string().default(""),
      description: z.string().default(""),
      category: z.string().default(""),
      active: z.boolean().default(true),
      order: z.number().int().default(100),
      price: z.string().default("0"),
    })
  ),
  /** Repeating order patterns: `count` requests, one every `every_days` */
  requests: z.array(
    z.object({
      cat_item: z.string(),
      count: z.number().int().min(1),
      every_days: z.number().positive(),
      hours_to_close: z.number().min(0).nullable().default(null),
      approval: z.enum(["approved", "rejected", "not requested", "requested"]).default("not requested"),
    })
  ),
  abandoned_carts: z.array(
    z.object({
      cat_item: z.string(),
      count: z.number().int().min(1),
      every_days: z.number().positive(),
    })
  ),
});

export type MockSeed = z.input<typeof SeedSchema>;

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

function snDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 19).replace("T", " ");
}

/**
 * Expand a seed into table rows. Request history counts back from `now`.
 */
export function buildTables(rawSeed: unknown, now: Date = new Date()): MockTables {
  const seed = SeedSchema.parse(rawSeed);
  const nowMs = now.getTime();

  const sc_category = seed.categories.map((c) => ({
    sys_id: c.sys_id,
    title: c.title,
    description: c.description,
    parent: c.parent,
    active: String(c.active),
    order: String(c.order),
  }));

  const sc_cat_item = seed.items.map((i) => ({
    sys_id: i.sys_id,
    name: i.name,
    short_description: i.short_description,
    description: i.description,
    category: i.category,
    active: String(i.active),
    order: String(i.order),
    price: i.price,
  }));

  const sc_req_item: MockRecord[] = [];
  for (const pattern of seed.requests) {
    for (let n = 0; n < pattern.count; n++) {
      const opened = nowMs - (n + 1) * pattern.every_days * DAY_MS;
      const closed = pattern.hours_to_close === null ? null : opened + pattern.hours_to_close * HOUR_MS;
      sc_req_item.push({
        sys_id: `ritm_${pattern.cat_item}_${sc_req_item.length}`,
        cat_item: pattern.cat_item,
        opened_at: snDate(opened),
        closed_at: closed === null || closed > nowMs ? "" : snDate(closed),
        state: closed === null || closed > nowMs ? "2" : "3",
        approval: pattern.approval,
      });
    }
  }

  const sc_cart_item: MockRecord[] = [];
  for (const pattern of seed.abandoned_carts) {
    for (let n = 0; n < pattern.count; n++) {
      sc_cart_item.push({
        sys_id: `cart_${pattern.cat_item}_${sc_cart_item.length}`,
        cat_item: pattern.cat_item,
        sys_created_on: snDate(nowMs - (n + 1) * pattern.every_days * DAY_MS),
      });
    }
  }

  return { sc_category, sc_cat_item, sc_req_item, sc_cart_item };
}

// ── Encoded queries ───────────────────────────────────────────

const OPERATORS = [">=", "<=", "!=", "LIKE", ">", "<", "="] as const;

type Operator = (typeof OPERATORS)[number];

interface Condition {
  field: string;
  operator: Operator;
  value: string;
}

export interface ParsedQuery {
  /** Conditions ANDed together; each group is an OR of its members */
  groups: Condition[][];
  orderBy: string | null;
}

/** Reference fields followed by dot-walked conditions */
const REFERENCES: Record<string, CatalogTable> = {
  cat_item: "sc_cat_item",
  category: "sc_category",
  parent: "sc_category",
};

function parseCondition(text: string): Condition | null {
  for (const operator of OPERATORS) {
    const at = text.indexOf(operator);
    if (at > 0) {
      return { field: text.slice(0, at), operator, value: text.slice(at + operator.length) };
    }
  }
  return null;
}

export function parseEncodedQuery(query: string): ParsedQuery {
  const groups: Condition[][] = [];
  let orderBy: string | null = null;

  for (const part of query.split("^")) {
    if (!part) continue;
    if (part.startsWith("ORDERBY")) {
      orderBy = part.slice("ORDERBY".length);
      continue;
    }
    const isOr = part.startsWith("OR") && groups.length > 0;
    const condition = parseCondition(isOr ? part.slice(2) : part);
    if (!condition) continue;
    if (isOr) groups[groups.length - 1].push(condition);
    else groups.push([condition]);
  }

  return { groups, orderBy };
}

function resolveField(record: MockRecord, path: string, tables: MockTables): string {
  const [head, ...rest] = path.split(".");
  const value = record[head] ?? "";
  if (rest.length === 0) return value;

  const table = REFERENCES[head];
  const target = table ? tables[table].find((r) => r.sys_id === value) : undefined;
  return target ? resolveField(target, rest.join("."), tables) : "";
}

function matches(record: MockRecord, c: Condition, tables: MockTables): boolean {
  const actual = resolveField(record, c.field, tables);
  switch (c.operator) {
    case "=":
      return actual === c.value;
    case "!=":
      return actual !== c.value;
    case "LIKE":
      return actual.toLowerCase().includes(c.value.toLowerCase());
    case ">=":
      return actual >= c.value;
    case "<=":
      return actual <= c.value;
    case ">":
      return actual > c.value;
    case "<":
      return actual < c.value;
  }
}

export function queryRecords(table: CatalogTable, query: string, tables: MockTables): MockRecord[] {
  const { groups, orderBy } = parseEncodedQuery(query);
  const selected = tables[table].filter((record) =>
    groups.every((group) => group.some((c) => matches(record, c, tables)))
  );
  if (orderBy) {
    selected.sort((a, b) => (a[orderBy] ?? "").localeCompare(b[orderBy] ?? ""));
  }
  return selected;
}

export function isCatalogTable(name: string): name is CatalogTable {
  return name === "sc_category" || name === "sc_cat_item" || name === "sc_req_item" || name === "sc_cart_item";
}

/**
 * Copy body fields onto a record. Unknown fields and sys_id are ignored,
 * and values are stored as Table API strings.
 */
export function patchRecord(record: MockRecord, body: unknown): MockRecord {
  if (body && typeof body === "object") {
    for (const [key, value] of Object.entries(body)) {
      if (key !== "sys_id" && key in record) record[key] = String(value);
    }
  }
  return record;
}

/**
 * Insert a category with the same defaults the seed uses.
 */
export function insertCategory(tables: MockTables, sysId: string, body: unknown): MockRecord {
  const record = patchRecord(
    { sys_id: sysId, title: "", description: "", parent: "", active: "true", order: "100" },
    body
  );
  tables.sc_category.push(record);
  return record;
}
