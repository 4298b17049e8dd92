import { IgraphError } from "../errors";
import type { PertGraph } from "../types";
import { compareIds } from "./edges";

/**
 * Kahn's algorithm. Among nodes that become ready at the same time the
 * smallest id goes first, so a given snapshot always yields the same order.
 *
 * Only call this on a graph whose cycle detection came back clean; a short
 * result means a cycle slipped through and is reported as INTERNAL_ERROR.
 */
export function topologicalOrder(graph: PertGraph): string[] {
  const inDegree = new Map<string, number>();
  const ready: string[] = [];
  for (const id of graph.nodes.keys()) {
    const degree = graph.predecessors.get(id)?.length ?? 0;
    inDegree.set(id, degree);
    if (degree === 0) {
      ready.push(id);
    }
  }
  ready.sort(compareIds);

  const order: string[] = [];
  while (ready.length > 0) {
    const id = ready.shift();
    if (id === undefined) {
      break;
    }
    order.push(id);
    for (const next of graph.successors.get(id) ?? []) {
      const remaining = (inDegree.get(next) ?? 0) - 1;
      inDegree.set(next, remaining);
      if (remaining === 0) {
        insertSorted(ready, next);
      }
    }
  }

  if (order.length !== graph.nodes.size) {
    throw new IgraphError(
      "INTERNAL_ERROR",
      `topological order covers ${order.length} of ${graph.nodes.size} nodes`,
      2,
      { unresolved: [...graph.nodes.keys()].filter((id) => !order.includes(id)) },
    );
  }
  return order;
}

function insertSorted(list: string[], id: string): void {
  let low = 0;
  let high = list.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const current = list[mid];
    if (current !== undefined && compareIds(current, id) < 0) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  list.splice(low, 0, id);
}
