/**
 * YAML Config Loader reads optimization thresholds from a YAML file
 * and merges them over the defaults.
 */

import { existsSync, readFileSync } from "fs";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { load as yamlLoad } from "js-yaml";

import { ConfigurationError, errorMessage } from "./catalog/errors.js";
import { DEFAULT_CONFIG, parseAnalysisConfig } from "./config/schema.js";
import type { AnalysisConfig } from "./config/schema.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Bundled thresholds file, one level above src/ and dist/. */
export const DEFAULT_CONFIG_PATH = resolve(__dirname, "..", "config", "optimization.yaml");

/**
 * Load and validate a thresholds file. An empty file yields the defaults.
 */
export function loadConfigFromYaml(filePath: string): AnalysisConfig {
  let raw: unknown;
  try {
    raw = yamlLoad(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(filePath, `could not read YAML: ${errorMessage(err)}`);
  }
  if (raw === undefined || raw === null) return DEFAULT_CONFIG;
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigurationError(filePath, "top level must be a mapping");
  }
  return parseAnalysisConfig(raw);
}

/**
 * Resolve the active configuration: CATALOG_OPTIMIZER_CONFIG if set,
 * then the bundled file, then the built-in defaults.
 */
export function loadAnalysisConfig(
  env: NodeJS.ProcessEnv = process.env
): { config: AnalysisConfig; source: string } {
  const explicit = env.CATALOG_OPTIMIZER_CONFIG;
  if (explicit) {
    const path = resolve(explicit);
    if (!existsSync(path)) {
      throw new ConfigurationError("CATALOG_OPTIMIZER_CONFIG", `file not found: ${path}`);
    }
    return { config: loadConfigFromYaml(path), source: path };
  }

  if (existsSync(DEFAULT_CONFIG_PATH)) {
    return { config: loadConfigFromYaml(DEFAULT_CONFIG_PATH), source: DEFAULT_CONFIG_PATH };
  }

  return { config: DEFAULT_CONFIG, source: "built-in defaults" };
}
