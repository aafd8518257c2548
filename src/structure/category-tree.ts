/**
 * Category tree built as an arena: nodes live in one array and refer to
 * each other by index. The input is never trusted to be a tree; broken
 * parent links and cycles are detected and reported, not followed.
 */

import type { CatalogCategory, RecordId } from "../catalog/types.js";

export interface CategoryNode {
  category: CatalogCategory;
  /** Arena indexes of the children */
  children: number[];
  /** Distance from a (possibly detached) root; null inside or below a cycle */
  depth: number | null;
}

export type OrphanReason = "missing_parent" | "inactive_parent";

export interface OrphanedCategory {
  index: number;
  parentId: RecordId;
  reason: OrphanReason;
}

export interface CategoryTree {
  nodes: CategoryNode[];
  indexById: Map<RecordId, number>;
  /** Categories without a parent */
  roots: number[];
  /** Categories whose parent link is broken; walked as detached roots */
  orphans: OrphanedCategory[];
  /** Each cycle as sorted category ids */
  cycles: RecordId[][];
}

export function buildCategoryTree(categories: readonly CatalogCategory[]): CategoryTree {
  const nodes: CategoryNode[] = [];
  const indexById = new Map<RecordId, number>();

  const sorted = [...categories].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  for (const category of sorted) {
    if (indexById.has(category.id)) continue;
    indexById.set(category.id, nodes.length);
    nodes.push({ category, children: [], depth: null });
  }

  const roots: number[] = [];
  const orphans: OrphanedCategory[] = [];
  const parentOf: Array<number | null> = nodes.map(() => null);

  nodes.forEach((node, index) => {
    const parentId = node.category.parentId;
    if (!parentId) {
      roots.push(index);
      return;
    }
    const parentIndex = indexById.get(parentId);
    if (parentIndex === undefined) {
      orphans.push({ index, parentId, reason: "missing_parent" });
      return;
    }
    if (parentIndex === index) {
      // A self-parent is a cycle of one, whatever its active flag
      parentOf[index] = index;
      return;
    }
    if (!nodes[parentIndex].category.active) {
      orphans.push({ index, parentId, reason: "inactive_parent" });
      return;
    }
    parentOf[index] = parentIndex;
    nodes[parentIndex].children.push(index);
  });

  // Breadth-first from every root and detached root
  const visited = new Set<number>();
  const queue: Array<{ index: number; depth: number }> = [
    ...roots.map((index) => ({ index, depth: 0 })),
    ...orphans.map((o) => ({ index: o.index, depth: 0 })),
  ];
  for (let head = 0; head < queue.length; head++) {
    const { index, depth } = queue[head];
    if (visited.has(index)) continue;
    visited.add(index);
    nodes[index].depth = depth;
    for (const child of nodes[index].children) {
      if (!visited.has(child)) queue.push({ index: child, depth: depth + 1 });
    }
  }

  // Anything unreached hangs off a cycle; walk parent chains to find the loops
  const cycles: RecordId[][] = [];
  const settled = new Set<number>(visited);
  for (let start = 0; start < nodes.length; start++) {
    if (settled.has(start)) continue;

    const path: number[] = [];
    const position = new Map<number, number>();
    let cursor: number | null = start;
    while (cursor !== null && !settled.has(cursor) && !position.has(cursor)) {
      position.set(cursor, path.length);
      path.push(cursor);
      cursor = parentOf[cursor];
    }

    if (cursor !== null && position.has(cursor)) {
      const loopStart = position.get(cursor) ?? 0;
      const members = path
        .slice(loopStart)
        .map((i) => nodes[i].category.id)
        .sort();
      cycles.push(members);
    }
    for (const index of path) settled.add(index);
  }

  cycles.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));

  return { nodes, indexById, roots, orphans, cycles };
}
