/**
 * MCP Resource Handlers expose the active rule set and configuration
 * as readable resources, so an agent knows the thresholds behind each
 * recommendation before asking for one.
 */

import type { AnalysisConfig } from "../config/schema.js";
import { describeRules } from "../rules/engine.js";
import { describeStructureChecks } from "../structure/analyzer.js";

export interface ResourceDefinition {
  name: string;
  uri: string;
  description: string;
  mimeType: string;
}

export const RULES_URI = "catalog://rules";
export const CONFIG_URI = "catalog://config";

export function listResources(): ResourceDefinition[] {
  return [
    {
      name: "rules",
      uri: RULES_URI,
      description:
        "Every recommendation rule family and structural check, with the thresholds currently in force.",
      mimeType: "text/markdown",
    },
    {
      name: "config",
      uri: CONFIG_URI,
      description: "The effective analysis configuration after defaults are applied.",
      mimeType: "application/json",
    },
  ];
}

export function readResource(
  uri: string,
  config: AnalysisConfig
): { content: string; mimeType: string } | null {
  if (uri === RULES_URI) {
    return {
      content: `${describeRules(config)}\n${describeStructureChecks(config)}`,
      mimeType: "text/markdown",
    };
  }

  if (uri === CONFIG_URI) {
    return { content: JSON.stringify(config, null, 2), mimeType: "application/json" };
  }

  return null;
}
