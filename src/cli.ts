#!/usr/bin/env node

/**
 * Catalog Optimizer CLI: run the analysis against a ServiceNow instance
 * from the terminal.
 *
 * Usage:
 *   catalog-optimizer connect               Test ServiceNow connection
 *   catalog-optimizer usage [window]        Per-item usage metrics
 *   catalog-optimizer recommend [window]    Ranked recommendations (--structure to merge structural findings)
 *   catalog-optimizer structure             Category tree and item set defects (--inactive to include inactive records)
 */

import "dotenv/config";

import type { AnalysisWarning, OperationResult, Recommendation } from "./catalog/types.js";
import { NAMED_WINDOWS } from "./config/schema.js";
import { ServiceNowCatalogGateway } from "./connectors/servicenow/catalog-gateway.js";
import { createConnectorFromEnv } from "./connectors/servicenow/client.js";
import { loadAnalysisConfig } from "./loader.js";
import { CatalogOptimizer } from "./optimizer.js";

const [command = "help", ...rest] = process.argv.slice(2);
const flags = new Set(rest.filter((arg) => arg.startsWith("--")));
const positional = rest.filter((arg) => !arg.startsWith("--"));

function printWarnings(warnings: AnalysisWarning[]): void {
  if (warnings.length === 0) return;
  console.log(`\n⚠️  ${warnings.length} warning(s):`);
  for (const w of warnings) {
    console.log(`  • [${w.code}] ${w.message}`);
  }
}

function printRecommendation(r: Recommendation, rank: number): void {
  console.log(`${String(rank).padStart(3)}. [${r.impact} impact / ${r.effort} effort] ${r.title}`);
  console.log(`     ${r.description}`);
  console.log(`     → ${r.action}`);
}

/** Prints the outcome line and returns false on failure */
function report<T>(result: OperationResult<T>): result is OperationResult<T> & { data: T } {
  if (!result.success || result.data === null) {
    console.error(`❌ ${result.message}`);
    return false;
  }
  console.log(`✅ ${result.message}\n`);
  return true;
}

function parseWindow(arg: string | undefined) {
  if (arg === undefined) return undefined;
  const match = NAMED_WINDOWS.find((w) => w === arg);
  if (!match) {
    console.error(`❌ Unknown window "${arg}". Expected one of: ${NAMED_WINDOWS.join(", ")}`);
    process.exit(1);
  }
  return match;
}

async function main() {
  console.log("╔══════════════════════════════════════════╗");
  console.log("║       Catalog Optimizer CLI v0.1.0       ║");
  console.log("╚══════════════════════════════════════════╝\n");

  if (command === "help") {
    console.log("Commands:");
    console.log("  connect              Test ServiceNow connection");
    console.log(`  usage [window]       Per-item usage metrics (${NAMED_WINDOWS.join(", ")})`);
    console.log("  recommend [window]   Ranked recommendations; --structure adds structural findings");
    console.log("  structure            Structural defects; --inactive includes inactive records");
    console.log("\nConfiguration: Set SERVICENOW_* variables in .env, thresholds in config/optimization.yaml");
    return;
  }

  const connector = createConnectorFromEnv();
  if (!connector) {
    console.error("❌ Missing ServiceNow configuration.");
    console.error("   Set SERVICENOW_INSTANCE_URL and either:");
    console.error("     OAuth: SERVICENOW_CLIENT_ID + SERVICENOW_CLIENT_SECRET");
    console.error("     Basic: SERVICENOW_USERNAME + SERVICENOW_PASSWORD");
    process.exit(1);
  }

  const gateway = new ServiceNowCatalogGateway(connector);

  if (command === "connect") {
    const result = await gateway.testConnection();
    if (!result.success) {
      console.error(`❌ ${result.message}`);
      process.exit(1);
    }
    console.log(`✅ ${result.message}`);
    return;
  }

  const { config, source } = loadAnalysisConfig();
  console.log(`Thresholds: ${source}\n`);
  const optimizer = new CatalogOptimizer(gateway, { config });

  // ── Usage ──────────────────────────────────────────────────

  if (command === "usage") {
    const result = await optimizer.analyzeUsage({ timeWindow: parseWindow(positional[0]) });
    if (!report(result)) process.exit(1);

    for (const s of result.data) {
      const fulfillment =
        s.meanFulfillmentHours === undefined ? "n/a" : `${s.meanFulfillmentHours.toFixed(1)}h`;
      console.log(
        `  ${s.itemId}  orders ${s.orderCount}  abandoned ${s.abandonmentCount} ` +
          `(${(s.abandonmentRate * 100).toFixed(0)}%)  fulfillment ${fulfillment}`
      );
    }
    printWarnings(result.warnings);
    return;
  }

  // ── Recommend ──────────────────────────────────────────────

  if (command === "recommend") {
    const result = await optimizer.getRecommendations({
      timeWindow: parseWindow(positional[0]),
      includeStructure: flags.has("--structure"),
    });
    if (!report(result)) process.exit(1);

    result.data.recommendations.forEach((r, i) => printRecommendation(r, i + 1));
    console.log(`\n📊 By type:`);
    for (const [type, count] of Object.entries(result.data.counts)) {
      console.log(`  ${type}: ${count}`);
    }
    printWarnings(result.warnings);
    return;
  }

  // ── Structure ──────────────────────────────────────────────

  if (command === "structure") {
    const result = await optimizer.analyzeStructure({ includeInactive: flags.has("--inactive") });
    if (!report(result)) process.exit(1);

    result.data.forEach((r, i) => printRecommendation(r, i + 1));
    printWarnings(result.warnings);
    return;
  }

  console.error(`❌ Unknown command "${command}". Run with "help" for usage.`);
  process.exit(1);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
