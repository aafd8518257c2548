/**
 * Structure Analyzer finds defects in the category tree and item set
 * without looking at usage: size imbalance, deep nesting, naming drift,
 * near-duplicate items, orphaned categories and parent cycles.
 */

import { Level } from "../catalog/types.js";
import type {
  AnalysisWarning,
  CatalogCategory,
  CatalogItem,
  Recommendation,
  RecordId,
} from "../catalog/types.js";
import type { AnalysisConfig } from "../config/schema.js";
import { round } from "../rules/rule-evaluator.js";
import { sortRecommendations } from "../rules/ordering.js";
import { buildCategoryTree } from "./category-tree.js";
import type { CategoryTree } from "./category-tree.js";
import { namingIssues } from "./naming.js";
import { descriptionSimilarity, normalizeText } from "./similarity.js";

export interface StructureInput {
  categories: readonly CatalogCategory[];
  items: readonly CatalogItem[];
  config: AnalysisConfig;
  /** When false, inactive items and categories are left out */
  includeInactive: boolean;
}

export interface StructureResult {
  recommendations: Recommendation[];
  warnings: AnalysisWarning[];
  tree: CategoryTree;
}

function byId<T extends { id: RecordId }>(a: T, b: T): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function checkCategories(
  tree: CategoryTree,
  items: readonly CatalogItem[],
  input: StructureInput,
  out: Recommendation[]
): void {
  const { config, includeInactive } = input;
  const { minItemsPerCategory, maxItemsPerCategory, maxDepth } = config.structure;
  const visible = (c: CatalogCategory) => includeInactive || c.active;

  const itemCounts = new Map<RecordId, number>();
  for (const item of items) {
    if (item.categoryId) itemCounts.set(item.categoryId, (itemCounts.get(item.categoryId) ?? 0) + 1);
  }

  for (const node of tree.nodes) {
    const category = node.category;
    if (!visible(category)) continue;

    const count = itemCounts.get(category.id) ?? 0;
    const isContainer = node.children.some((child) => visible(tree.nodes[child].category));

    if (count > maxItemsPerCategory) {
      out.push({
        id: `too_many_items:${category.id}`,
        type: "too_many_items",
        title: `Split category "${category.title}"`,
        description:
          `"${category.title}" holds ${count} items, above the maximum of ${maxItemsPerCategory}.`,
        action: "Split the category into focused subcategories",
        impact: Level.MEDIUM,
        effort: Level.MEDIUM,
        itemIds: [],
        categoryIds: [category.id],
        evidence: { itemCount: count, max: maxItemsPerCategory },
      });
    } else if (count < minItemsPerCategory && !(count === 0 && isContainer)) {
      out.push({
        id: `too_few_items:${category.id}`,
        type: "too_few_items",
        title: `Consolidate category "${category.title}"`,
        description:
          `"${category.title}" holds ${count} items, below the minimum of ${minItemsPerCategory}.`,
        action: "Merge the category into a related one or add items to it",
        impact: Level.LOW,
        effort: Level.LOW,
        itemIds: [],
        categoryIds: [category.id],
        evidence: { itemCount: count, min: minItemsPerCategory },
      });
    }

    if (node.depth !== null && node.depth > maxDepth) {
      out.push({
        id: `deep_nesting:${category.id}`,
        type: "deep_nesting",
        title: `Flatten category "${category.title}"`,
        description:
          `"${category.title}" sits at depth ${node.depth}, deeper than the maximum of ${maxDepth}.`,
        action: "Move the category closer to the top of the catalog",
        impact: Level.MEDIUM,
        effort: Level.HIGH,
        itemIds: [],
        categoryIds: [category.id],
        evidence: { depth: node.depth, maxDepth },
      });
    }

    const issues = namingIssues(category.title, config.naming);
    if (issues.length > 0) {
      out.push(namingRecommendation("category", category.id, category.title, issues));
    }
  }
}

function namingRecommendation(
  kind: "category" | "item",
  id: RecordId,
  name: string,
  issues: string[]
): Recommendation {
  return {
    id: `naming_inconsistency:${id}`,
    type: "naming_inconsistency",
    title: `Rename ${kind} "${name.trim()}"`,
    description: `The ${kind} name "${name}" breaks the naming convention: ${issues.join("; ")}.`,
    action: "Rename to follow the catalog naming convention",
    impact: Level.LOW,
    effort: Level.LOW,
    itemIds: kind === "item" ? [id] : [],
    categoryIds: kind === "category" ? [id] : [],
    evidence: { issues: issues.join("; ") },
  };
}

function checkBrokenLinks(
  tree: CategoryTree,
  input: StructureInput,
  out: Recommendation[],
  warnings: AnalysisWarning[]
): void {
  const visible = (c: CatalogCategory) => input.includeInactive || c.active;

  for (const orphan of tree.orphans) {
    const category = tree.nodes[orphan.index].category;
    if (!visible(category)) continue;
    const why =
      orphan.reason === "missing_parent"
        ? `its parent ${orphan.parentId} does not exist`
        : `its parent ${orphan.parentId} is inactive`;

    warnings.push({
      code: "orphaned_category",
      message: `Category ${category.id} is orphaned: ${why}`,
      subjectId: category.id,
    });
    out.push({
      id: `orphaned_category:${category.id}`,
      type: "orphaned_category",
      title: `Re-parent orphaned category "${category.title}"`,
      description: `"${category.title}" is unreachable from the catalog root because ${why}.`,
      action: "Assign the category to an active parent or make it a top-level category",
      impact: Level.HIGH,
      effort: Level.LOW,
      itemIds: [],
      categoryIds: [category.id],
      evidence: { parentId: orphan.parentId, reason: orphan.reason },
    });
  }

  for (const members of tree.cycles) {
    const categories = members.flatMap((id) => {
      const index = tree.indexById.get(id);
      return index === undefined ? [] : [tree.nodes[index].category];
    });
    if (!categories.some(visible)) continue;

    warnings.push({
      code: "category_cycle",
      message: `Categories ${members.join(" -> ")} form a parent cycle`,
      subjectId: members[0],
    });
    out.push({
      id: `category_cycle:${members.join("|")}`,
      type: "category_cycle",
      title: "Break category parent cycle",
      description:
        `Categories ${categories.map((c) => `"${c.title}"`).join(", ")} are each other's ancestors.`,
      action: "Point one of the categories at a real parent to break the loop",
      impact: Level.HIGH,
      effort: Level.MEDIUM,
      itemIds: [],
      categoryIds: members,
      evidence: { length: members.length },
    });
  }
}

function checkDuplicates(
  items: readonly CatalogItem[],
  config: AnalysisConfig,
  out: Recommendation[]
): void {
  const { similarityThreshold, crossCategory } = config.duplicates;
  const candidates = items.filter((item) => normalizeText(item.shortDescription).length > 0);

  for (let i = 0; i < candidates.length; i++) {
    for (let j = i + 1; j < candidates.length; j++) {
      const a = candidates[i];
      const b = candidates[j];
      if (!crossCategory && a.categoryId !== b.categoryId) continue;

      const score = descriptionSimilarity(a.shortDescription, b.shortDescription);
      if (score < similarityThreshold) continue;

      const categoryIds = [...new Set([a.categoryId, b.categoryId])]
        .filter((id): id is RecordId => id !== null)
        .sort();
      out.push({
        id: `possible_duplicate:${a.id}|${b.id}`,
        type: "possible_duplicate",
        title: `Possible duplicates: "${a.name}" and "${b.name}"`,
        description:
          `The short descriptions of "${a.name}" and "${b.name}" are ` +
          `${round(score * 100, 1)}% similar.`,
        action: "Merge the items or make their descriptions distinguish them",
        impact: Level.MEDIUM,
        effort: Level.LOW,
        itemIds: [a.id, b.id],
        categoryIds,
        evidence: { similarity: round(score) },
      });
    }
  }
}

export function analyzeStructure(input: StructureInput): StructureResult {
  const tree = buildCategoryTree(input.categories);
  const items = input.items
    .filter((item) => input.includeInactive || item.active)
    .sort(byId);

  const recommendations: Recommendation[] = [];
  const warnings: AnalysisWarning[] = [];

  checkBrokenLinks(tree, input, recommendations, warnings);
  checkCategories(tree, items, input, recommendations);

  for (const item of items) {
    const issues = namingIssues(item.name, input.config.naming);
    if (issues.length > 0) {
      recommendations.push(namingRecommendation("item", item.id, item.name, issues));
    }
  }

  checkDuplicates(items, input.config, recommendations);

  return { recommendations: sortRecommendations(recommendations), warnings, tree };
}

/**
 * Describe the structural checks with their active thresholds.
 */
export function describeStructureChecks(config: AnalysisConfig): string {
  const { structure, naming, duplicates } = config;
  return [
    "# Catalog Structure Checks",
    "",
    `- too_few_items / too_many_items: direct item count outside ` +
      `[${structure.minItemsPerCategory}, ${structure.maxItemsPerCategory}]; ` +
      "categories holding only subcategories are exempt from the minimum",
    `- deep_nesting: category depth above ${structure.maxDepth} (top-level categories are depth 0)`,
    `- naming_inconsistency: names not in ${naming.style} or containing ` +
      (naming.disallowedTokens.length > 0 ? naming.disallowedTokens.join(", ") : "no banned tokens"),
    `- possible_duplicate: short descriptions at least ${round(duplicates.similarityThreshold * 100, 1)}% ` +
      `similar (normalized Levenshtein), ${duplicates.crossCategory ? "across categories" : "within a category"}`,
    "- orphaned_category: parent missing or inactive",
    "- category_cycle: parent chain loops back on itself",
    "",
  ].join("\n");
}
