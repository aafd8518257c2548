import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join, resolve } from "path";
import { afterAll, describe, expect, it } from "vitest";

import { ConfigurationError } from "../catalog/errors.js";
import { DEFAULT_CONFIG, parseAnalysisConfig, parseRuleFamilies } from "../config/schema.js";
import { DEFAULT_CONFIG_PATH, loadAnalysisConfig, loadConfigFromYaml } from "../loader.js";

const dir = mkdtempSync(join(tmpdir(), "catalog-optimizer-"));

function yamlFile(name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content, "utf-8");
  return path;
}

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("parseAnalysisConfig", () => {
  it("fills every default", () => {
    expect(DEFAULT_CONFIG.defaultWindow).toBe("last_90_days");
    expect(DEFAULT_CONFIG.highAbandonment).toEqual({ threshold: 0.5, minimumSampleSize: 5 });
    expect(DEFAULT_CONFIG.structure).toEqual({
      minItemsPerCategory: 1,
      maxItemsPerCategory: 50,
      maxDepth: 4,
    });
    expect(DEFAULT_CONFIG.duplicates).toEqual({ similarityThreshold: 0.85, crossCategory: false });
    expect(DEFAULT_CONFIG.fetch).toEqual({ timeoutMs: 30000, sliceDays: 30 });
  });

  it("merges partial sections over the defaults and freezes the result", () => {
    const config = parseAnalysisConfig({ structure: { maxDepth: 2 } });
    expect(config.structure).toEqual({ minItemsPerCategory: 1, maxItemsPerCategory: 50, maxDepth: 2 });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.structure)).toBe(true);
  });

  it("names the field of an out-of-range threshold", () => {
    expect(() => parseAnalysisConfig({ highAbandonment: { threshold: 1.5 } })).toThrow(
      'Invalid configuration at "highAbandonment.threshold"'
    );
  });

  it("rejects an inverted category size band", () => {
    expect(() =>
      parseAnalysisConfig({ structure: { minItemsPerCategory: 10, maxItemsPerCategory: 5 } })
    ).toThrow(
      'Invalid configuration at "structure.minItemsPerCategory": ' +
        "minItemsPerCategory (10) must not exceed maxItemsPerCategory (5)"
    );
  });

  it("rejects unknown rule families by position", () => {
    expect(() => parseAnalysisConfig({ ruleFamilies: ["low_usage", "nonsense"] })).toThrow(
      'Invalid configuration at "ruleFamilies[1]"'
    );
  });

  it("caps the fetch timeout at what a timer can hold", () => {
    expect(parseAnalysisConfig({ fetch: { timeoutMs: 2_147_483_647 } }).fetch.timeoutMs).toBe(2_147_483_647);
    expect(() => parseAnalysisConfig({ fetch: { timeoutMs: 3_000_000_000 } })).toThrow(
      'Invalid configuration at "fetch.timeoutMs"'
    );
  });

  it("requires at least one rule family", () => {
    expect(() => parseAnalysisConfig({ ruleFamilies: [] })).toThrow('Invalid configuration at "ruleFamilies"');
  });

  it("rejects unknown keys", () => {
    expect(() => parseAnalysisConfig({ bogus: 1 })).toThrow(ConfigurationError);
  });
});

describe("parseRuleFamilies", () => {
  it("deduplicates while keeping order", () => {
    expect(parseRuleFamilies(["low_usage", "inactive_items", "low_usage"])).toEqual([
      "low_usage",
      "inactive_items",
    ]);
  });

  it("lists the valid families when one is unknown", () => {
    expect(() => parseRuleFamilies(["low_usage", "bogus"])).toThrow(
      'Invalid configuration at "rule_families[1]": unknown rule family "bogus" ' +
        "(expected one of: inactive_items, low_usage, high_abandonment, slow_fulfillment, description_quality)"
    );
  });
});

describe("loadConfigFromYaml", () => {
  it("reads the bundled thresholds file", () => {
    expect(loadConfigFromYaml(DEFAULT_CONFIG_PATH)).toEqual(DEFAULT_CONFIG);
  });

  it("returns the defaults for an empty file", () => {
    expect(loadConfigFromYaml(yamlFile("empty.yaml", ""))).toBe(DEFAULT_CONFIG);
  });

  it("applies overrides from YAML", () => {
    const path = yamlFile("custom.yaml", "lowUsage:\n  percentile: 0.25\nnaming:\n  style: any\n");
    const config = loadConfigFromYaml(path);
    expect(config.lowUsage).toEqual({ percentile: 0.25, includeZeroActivity: false });
    expect(config.naming.style).toBe("any");
  });

  it("rejects an empty rule family list from YAML", () => {
    const path = yamlFile("no-rules.yaml", "ruleFamilies: []\n");
    expect(() => loadConfigFromYaml(path)).toThrow(ConfigurationError);
  });

  it("requires a mapping at the top level", () => {
    const path = yamlFile("list.yaml", "- low_usage\n");
    expect(() => loadConfigFromYaml(path)).toThrow(
      `Invalid configuration at "${path}": top level must be a mapping`
    );
  });
});

describe("loadAnalysisConfig", () => {
  it("prefers CATALOG_OPTIMIZER_CONFIG", () => {
    const path = yamlFile("env.yaml", "fetch:\n  sliceDays: 7\n");
    const { config, source } = loadAnalysisConfig({ CATALOG_OPTIMIZER_CONFIG: path });
    expect(source).toBe(resolve(path));
    expect(config.fetch.sliceDays).toBe(7);
  });

  it("fails when the named file does not exist", () => {
    const missing = join(dir, "missing.yaml");
    expect(() => loadAnalysisConfig({ CATALOG_OPTIMIZER_CONFIG: missing })).toThrow(
      `Invalid configuration at "CATALOG_OPTIMIZER_CONFIG": file not found: ${resolve(missing)}`
    );
  });

  it("falls back to the bundled file", () => {
    expect(loadAnalysisConfig({}).source).toBe(DEFAULT_CONFIG_PATH);
  });
});
