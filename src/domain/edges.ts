import type { PertEdge } from "../types";

export function edgeKey(from: string, to: string): string {
  return `${from}\u0000${to}`;
}

/** Keep non-empty string ids, first occurrence wins. */
export function normalizeIdList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const seen = new Set<string>();
  const ids: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string") {
      continue;
    }
    if (entry.length === 0 || seen.has(entry)) {
      continue;
    }
    seen.add(entry);
    ids.push(entry);
  }
  return ids;
}

export function formatEdge(edge: PertEdge): string {
  return `${edge.from} → ${edge.to}`;
}

export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareEdges(a: PertEdge, b: PertEdge): number {
  return compareIds(a.from, b.from) || compareIds(a.to, b.to);
}
