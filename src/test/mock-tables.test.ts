import { describe, expect, it } from "vitest";

import {
  buildTables,
  insertCategory,
  isCatalogTable,
  parseEncodedQuery,
  patchRecord,
  queryRecords,
} from "../mock/catalog-tables.js";

const NOW = new Date("2026-02-01T00:00:00Z");

const seed = {
  categories: [
    { sys_id: "hw", title: "Hardware" },
    { sys_id: "sw", title: "Software" },
  ],
  items: [
    { sys_id: "lap", name: "Standard Laptop", short_description: "Laptop for office work", category: "hw" },
    { sys_id: "mon", name: "Monitor", short_description: "27 inch display", category: "hw" },
    { sys_id: "ide", name: "IDE License", category: "sw", active: false },
  ],
  requests: [
    { cat_item: "lap", count: 2, every_days: 10, hours_to_close: 24, approval: "approved" },
    { cat_item: "ide", count: 1, every_days: 1, hours_to_close: 48 },
  ],
  abandoned_carts: [{ cat_item: "mon", count: 1, every_days: 3 }],
};

const tables = buildTables(seed, NOW);

function ids(records: Array<Record<string, string>>): string[] {
  return records.map((r) => r.sys_id);
}

describe("buildTables", () => {
  it("renders records as Table API strings", () => {
    expect(tables.sc_cat_item[2]).toEqual({
      sys_id: "ide",
      name: "IDE License",
      short_description: "",
      description: "",
      category: "sw",
      active: "false",
      order: "100",
      price: "0",
    });
    expect(tables.sc_category[0]).toMatchObject({ sys_id: "hw", parent: "", active: "true" });
  });

  it("spreads request history back from now", () => {
    expect(tables.sc_req_item).toEqual([
      {
        sys_id: "ritm_lap_0",
        cat_item: "lap",
        opened_at: "2026-01-22 00:00:00",
        closed_at: "2026-01-23 00:00:00",
        state: "3",
        approval: "approved",
      },
      {
        sys_id: "ritm_lap_1",
        cat_item: "lap",
        opened_at: "2026-01-12 00:00:00",
        closed_at: "2026-01-13 00:00:00",
        state: "3",
        approval: "approved",
      },
      {
        sys_id: "ritm_ide_2",
        cat_item: "ide",
        opened_at: "2026-01-31 00:00:00",
        closed_at: "",
        state: "2",
        approval: "not requested",
      },
    ]);
    expect(tables.sc_cart_item).toEqual([
      { sys_id: "cart_mon_0", cat_item: "mon", sys_created_on: "2026-01-29 00:00:00" },
    ]);
  });

  it("rejects a malformed seed", () => {
    expect(() => buildTables({ categories: "hw" }, NOW)).toThrow();
  });
});

describe("parseEncodedQuery", () => {
  it("groups OR conditions and reads the sort field", () => {
    expect(parseEncodedQuery("active=true^nameLIKElap^ORshort_descriptionLIKElap^ORDERBYname")).toEqual({
      groups: [
        [{ field: "active", operator: "=", value: "true" }],
        [
          { field: "name", operator: "LIKE", value: "lap" },
          { field: "short_description", operator: "LIKE", value: "lap" },
        ],
      ],
      orderBy: "name",
    });
  });

  it("reads two-character operators before one-character ones", () => {
    expect(parseEncodedQuery("opened_at>=2026-01-01 00:00:00^opened_at<2026-02-01 00:00:00").groups).toEqual([
      [{ field: "opened_at", operator: ">=", value: "2026-01-01 00:00:00" }],
      [{ field: "opened_at", operator: "<", value: "2026-02-01 00:00:00" }],
    ]);
  });
});

describe("queryRecords", () => {
  it("filters by date range and dot-walked category", () => {
    const query = "opened_at>=2026-01-15 00:00:00^opened_at<2026-02-01 00:00:00^cat_item.category=hw";
    expect(ids(queryRecords("sc_req_item", query, tables))).toEqual(["ritm_lap_0"]);
  });

  it("matches OR groups case-insensitively and sorts", () => {
    const query = "active=true^nameLIKEmonitor^ORshort_descriptionLIKELAPTOP^ORDERBYname";
    expect(ids(queryRecords("sc_cat_item", query, tables))).toEqual(["mon", "lap"]);
  });

  it("supports inequality", () => {
    expect(ids(queryRecords("sc_cat_item", "category!=hw", tables))).toEqual(["ide"]);
  });

  it("returns every record for an empty query", () => {
    expect(ids(queryRecords("sc_category", "", tables))).toEqual(["hw", "sw"]);
  });
});

describe("isCatalogTable", () => {
  it("accepts only the catalog tables", () => {
    expect(isCatalogTable("sc_req_item")).toBe(true);
    expect(isCatalogTable("sys_user")).toBe(false);
  });
});

describe("record writes", () => {
  it("patch only fields the record already has", () => {
    const record = { sys_id: "lap", name: "Standard Laptop", active: "true" };
    expect(patchRecord(record, { sys_id: "other", name: "Travel Laptop", active: false, colour: "grey" })).toEqual({
      sys_id: "lap",
      name: "Travel Laptop",
      active: "false",
    });
  });

  it("insert a category with seed defaults", () => {
    const fresh = buildTables(seed, NOW);
    const record = insertCategory(fresh, "mock_cat_1", { title: "Peripherals", parent: "hw" });

    expect(record).toEqual({
      sys_id: "mock_cat_1",
      title: "Peripherals",
      description: "",
      parent: "hw",
      active: "true",
      order: "100",
    });
    expect(ids(queryRecords("sc_category", "parent=hw", fresh))).toEqual(["mock_cat_1"]);
    expect(tables.sc_category).toHaveLength(2);
  });
});
