#!/usr/bin/env node

/**
 * Catalog Optimizer: MCP server entry point
 *
 * Serves catalog usage analysis, recommendations and structure checks
 * over stdio. stdout carries the protocol, so all logging goes to stderr.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { config as dotenvConfig } from "dotenv";

import { errorMessage } from "./catalog/errors.js";
import type { CatalogGateway } from "./connectors/types.js";
import { ServiceNowCatalogGateway } from "./connectors/servicenow/catalog-gateway.js";
import { createConnectorFromEnv } from "./connectors/servicenow/client.js";
import { loadAnalysisConfig } from "./loader.js";
import { CatalogOptimizer } from "./optimizer.js";
import { createCatalogServer } from "./server/server.js";

dotenvConfig();

// ── Configuration ─────────────────────────────────────────────

const { config, source } = loadAnalysisConfig();
console.error(`Loaded analysis configuration from ${source}`);
console.error(`Rule families: ${config.ruleFamilies.join(", ")}`);

// ── ServiceNow ────────────────────────────────────────────────

const connector = createConnectorFromEnv();
const serviceNow = connector ? new ServiceNowCatalogGateway(connector) : null;

if (connector) {
  console.error(`ServiceNow gateway: ${connector.getInstanceUrl()}`);
} else {
  console.error(
    "ServiceNow not configured (set SERVICENOW_INSTANCE_URL and credentials); analysis tools will fail"
  );
}

/** Stands in when no instance is configured, so tools answer with a failure result. */
const unconfigured: CatalogGateway = {
  fetchItems: () => Promise.reject(new Error("ServiceNow is not configured")),
  fetchCategories: () => Promise.reject(new Error("ServiceNow is not configured")),
  fetchOrderEvents: () => Promise.reject(new Error("ServiceNow is not configured")),
};

// ── Start ─────────────────────────────────────────────────────

const optimizer = new CatalogOptimizer(serviceNow ?? unconfigured, { config });
const server = createCatalogServer({ optimizer, store: serviceNow });

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Catalog optimizer MCP server running on stdio");
}

main().catch((error) => {
  console.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
