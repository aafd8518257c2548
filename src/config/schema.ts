/**
 * Analysis configuration: every threshold the optimizer uses, with
 * defaults. A parsed config is frozen and passed explicitly into each
 * component call; nothing reads thresholds from ambient state.
 */

import { z } from "zod";

import { ConfigurationError } from "../catalog/errors.js";
import { RULE_FAMILIES } from "../catalog/types.js";
import type { RuleFamily } from "../catalog/types.js";

export const NAMED_WINDOWS = [
  "last_7_days",
  "last_30_days",
  "last_90_days",
  "last_year",
] as const;

export const DESCRIPTION_FIELDS = ["name", "short_description", "description"] as const;

export const TimeWindowSchema = z.union([
  z.enum(NAMED_WINDOWS),
  z.object({
    start: z.string().min(1),
    end: z.string().min(1),
  }),
]);

const unitInterval = z.number().min(0).max(1);

/** Largest delay a Node.js timer can hold */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const StructureSchema = z
  .object({
    minItemsPerCategory: z.number().int().min(0).default(1),
    maxItemsPerCategory: z.number().int().min(1).default(50),
    maxDepth: z.number().int().min(0).default(4),
  })
  .superRefine((band, ctx) => {
    if (band.minItemsPerCategory > band.maxItemsPerCategory) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["minItemsPerCategory"],
        message:
          `minItemsPerCategory (${band.minItemsPerCategory}) must not exceed ` +
          `maxItemsPerCategory (${band.maxItemsPerCategory})`,
      });
    }
  });

export const AnalysisConfigSchema = z
  .object({
    defaultWindow: TimeWindowSchema.default("last_90_days"),
    ruleFamilies: z.array(z.enum(RULE_FAMILIES)).min(1).default([...RULE_FAMILIES]),
    lowUsage: z
      .object({
        percentile: z.number().gt(0).max(1).default(0.1),
        includeZeroActivity: z.boolean().default(false),
      })
      .strict()
      .default({}),
    highAbandonment: z
      .object({
        threshold: unitInterval.default(0.5),
        minimumSampleSize: z.number().int().min(1).default(5),
      })
      .strict()
      .default({}),
    slowFulfillment: z
      .object({
        ratio: z.number().gt(0).default(1.5),
      })
      .strict()
      .default({}),
    descriptionQuality: z
      .object({
        minLength: z.number().int().min(0).default(30),
        requiredFields: z
          .array(z.enum(DESCRIPTION_FIELDS))
          .default(["short_description", "description"]),
      })
      .strict()
      .default({}),
    structure: StructureSchema.default({}),
    naming: z
      .object({
        style: z.enum(["title_case", "sentence_case", "any"]).default("title_case"),
        disallowedTokens: z
          .array(z.string().min(1))
          .default(["copy", "test", "tmp", "deprecated"]),
      })
      .strict()
      .default({}),
    duplicates: z
      .object({
        similarityThreshold: z.number().gt(0).max(1).default(0.85),
        crossCategory: z.boolean().default(false),
      })
      .strict()
      .default({}),
    fetch: z
      .object({
        timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).default(30_000),
        sliceDays: z.number().int().min(1).default(30),
      })
      .strict()
      .default({}),
  })
  .strict();

export type AnalysisConfig = Readonly<z.output<typeof AnalysisConfigSchema>>;

export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Format a zod issue path the way users write config keys:
 * `structure.maxDepth`, `ruleFamilies[2]`.
 */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out ? `.${segment}` : segment;
    }
  }
  return out || "(root)";
}

/**
 * Validate raw configuration (from YAML or a caller) and merge it over the
 * defaults. Throws ConfigurationError on the first problem.
 */
export function parseAnalysisConfig(raw: unknown): AnalysisConfig {
  const parsed = AnalysisConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(formatIssuePath(issue.path), issue.message);
  }
  return deepFreeze(parsed.data);
}

/**
 * Validate a caller-supplied list of rule family names.
 */
export function parseRuleFamilies(
  names: readonly string[],
  field: string = "rule_families"
): RuleFamily[] {
  const families: RuleFamily[] = [];
  names.forEach((name, index) => {
    const match = RULE_FAMILIES.find((family) => family === name);
    if (!match) {
      throw new ConfigurationError(
        `${field}[${index}]`,
        `unknown rule family "${name}" (expected one of: ${RULE_FAMILIES.join(", ")})`
      );
    }
    if (!families.includes(match)) families.push(match);
  });
  return families;
}

export const DEFAULT_CONFIG: AnalysisConfig = parseAnalysisConfig({});
