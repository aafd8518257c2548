#!/usr/bin/env node

/**
 * Mock ServiceNow REST API Server
 *
 * Simulates a ServiceNow instance with a small service catalog and its
 * order history, for running the CLI and MCP server without a live
 * environment.
 *
 * Run: npm run mock-snow
 * Then point SERVICENOW_INSTANCE_URL at http://localhost:8090 with any
 * Basic credentials.
 */

import express from "express";
import { readFileSync } from "fs";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";

import {
  buildTables,
  insertCategory,
  isCatalogTable,
  patchRecord,
  queryRecords,
} from "./catalog-tables.js";
import type { MockRecord } from "./catalog-tables.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const seedPath = resolve(__dirname, "..", "..", "data", "mock-catalog.json");

const TABLES = buildTables(JSON.parse(readFileSync(seedPath, "utf-8")));

const app = express();
app.use(express.json());
app.use(express.urlencoded({ extended: false }));

// ── Auth ──────────────────────────────────────────────────────

function checkAuth(req: express.Request, res: express.Response): boolean {
  const auth = req.headers.authorization;
  if (!auth || !(auth.startsWith("Basic ") || auth.startsWith("Bearer "))) {
    res.status(401).json({ error: { message: "User Not Authenticated" } });
    return false;
  }
  return true;
}

app.post("/oauth_token.do", (_req, res) => {
  res.json({ access_token: "mock-access-token", token_type: "Bearer", expires_in: 1800 });
});

// ── Table API ─────────────────────────────────────────────────

function param(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

function pick(record: MockRecord, fields: string): MockRecord {
  if (!fields) return record;
  const out: MockRecord = {};
  for (const field of fields.split(",")) {
    if (field in record) out[field] = record[field];
  }
  return out;
}

app.get("/api/now/table/:tableName", (req, res) => {
  if (!checkAuth(req, res)) return;

  const tableName = req.params.tableName;
  if (!isCatalogTable(tableName)) {
    res.status(404).json({ error: { message: `Table ${tableName} not found` } });
    return;
  }

  const limit = parseInt(param(req.query.sysparm_limit, "100"), 10);
  const offset = parseInt(param(req.query.sysparm_offset, "0"), 10);
  const fields = param(req.query.sysparm_fields, "");
  const records = queryRecords(tableName, param(req.query.sysparm_query, ""), TABLES);

  res.json({ result: records.slice(offset, offset + limit).map((r) => pick(r, fields)) });
});

let createdCategories = 0;

app.post("/api/now/table/sc_category", (req, res) => {
  if (!checkAuth(req, res)) return;
  createdCategories += 1;
  const record = insertCategory(TABLES, `mock_cat_${createdCategories}`, req.body);
  res.status(201).json({ result: record });
});

app.patch("/api/now/table/:tableName/:sysId", (req, res) => {
  if (!checkAuth(req, res)) return;

  const tableName = req.params.tableName;
  if (tableName !== "sc_cat_item" && tableName !== "sc_category") {
    res.status(405).json({ error: { message: `Table ${tableName} is read-only` } });
    return;
  }

  const record = TABLES[tableName].find((r) => r.sys_id === req.params.sysId);
  if (!record) {
    res.status(404).json({ error: { message: "Record not found" } });
    return;
  }
  res.json({ result: patchRecord(record, req.body) });
});

// ── Root route (browser-friendly status) ──────────────────────

app.get("/", (_req, res) => {
  res.type("html").send(`
    <html><body style="font-family:system-ui;max-width:600px;margin:2rem auto;color:#333;">
      <h1>Mock ServiceNow Server</h1>
      <p style="color:green;font-weight:bold;">&#10003; Running and ready for the catalog optimizer</p>
      <h3>Available tables</h3>
      <ul>${Object.entries(TABLES).map(([t, rows]) => `<li>${t} (${rows.length} records)</li>`).join("")}</ul>
    </body></html>
  `);
});

// ── Start ─────────────────────────────────────────────────────

const PORT = parseInt(process.env.MOCK_SNOW_PORT || "8090", 10);
app.listen(PORT, () => {
  console.log(`Mock ServiceNow server running at http://localhost:${PORT}`);
  console.log(`  Auth: any Basic or Bearer auth accepted`);
  console.log(`  Tables: ${Object.keys(TABLES).join(", ")}`);
  console.log(
    `  Categories: ${TABLES.sc_category.length}, Items: ${TABLES.sc_cat_item.length}, ` +
      `Requests: ${TABLES.sc_req_item.length}, Abandoned carts: ${TABLES.sc_cart_item.length}`
  );
});
