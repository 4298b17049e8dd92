import type { CycleDetection, PertGraph } from "../types";
import { compareIds } from "./edges";

interface Frame {
  id: string;
  next: number;
}

/**
 * Find every edge that lies on a directed cycle.
 *
 * An edge is on a cycle exactly when both endpoints share a strongly
 * connected component (a self-reference included), so the whole offending
 * subset is reported rather than the first back edge found. Edges keep the
 * graph's edge order.
 */
export function detectCycles(graph: PertGraph): CycleDetection {
  const component = stronglyConnectedComponents(graph);
  const cycleEdges = graph.edges
    .filter((edge) => component.get(edge.from) === component.get(edge.to))
    .map((edge) => ({ from: edge.from, to: edge.to }));
  return {
    has_cycle: cycleEdges.length > 0,
    cycle_edges: cycleEdges,
  };
}

/**
 * One readable loop per offending component, e.g. `A → B → C → A`.
 * Each loop starts at the smallest id of its component and is the shortest
 * way back to it.
 */
export function describeCycles(graph: PertGraph): string[] {
  const component = stronglyConnectedComponents(graph);
  const starts = new Map<number, string>();
  for (const edge of graph.edges) {
    const group = component.get(edge.from);
    if (group === undefined || group !== component.get(edge.to)) {
      continue;
    }
    const current = starts.get(group);
    if (current === undefined || compareIds(edge.from, current) < 0) {
      starts.set(group, edge.from);
    }
  }

  return [...starts.entries()]
    .sort((a, b) => compareIds(a[1], b[1]))
    .map(([group, start]) => shortestLoop(graph, component, group, start).join(" → "));
}

function shortestLoop(
  graph: PertGraph,
  component: Map<string, number>,
  group: number,
  start: string,
): string[] {
  const parent = new Map<string, string>();
  const visited = new Set<string>([start]);
  const queue = [start];
  let closing: string | undefined;

  for (let head = 0; head < queue.length && closing === undefined; head += 1) {
    const current = queue[head];
    if (current === undefined) {
      break;
    }
    for (const next of graph.successors.get(current) ?? []) {
      if (component.get(next) !== group) {
        continue;
      }
      if (next === start) {
        closing = current;
        break;
      }
      if (!visited.has(next)) {
        visited.add(next);
        parent.set(next, current);
        queue.push(next);
      }
    }
  }

  const path: string[] = [];
  let cursor = closing;
  while (cursor !== undefined && cursor !== start) {
    path.push(cursor);
    cursor = parent.get(cursor);
  }
  path.reverse();
  return [start, ...path, start];
}

/**
 * Tarjan's algorithm over an explicit work list: `index` doubles as the
 * visited marker and `onStack` as the on-stack marker.
 */
function stronglyConnectedComponents(graph: PertGraph): Map<string, number> {
  const index = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const component = new Map<string, number>();
  let nextIndex = 0;
  let nextComponent = 0;

  const visit = (id: string): void => {
    index.set(id, nextIndex);
    lowLink.set(id, nextIndex);
    nextIndex += 1;
    stack.push(id);
    onStack.add(id);
  };
  const low = (id: string): number => lowLink.get(id) ?? 0;

  const roots = [...graph.nodes.keys()].sort(compareIds);
  for (const root of roots) {
    if (index.has(root)) {
      continue;
    }
    visit(root);
    const work: Frame[] = [{ id: root, next: 0 }];

    while (work.length > 0) {
      const frame = work[work.length - 1];
      if (!frame) {
        break;
      }
      const neighbors = graph.successors.get(frame.id) ?? [];
      if (frame.next < neighbors.length) {
        const neighbor = neighbors[frame.next];
        frame.next += 1;
        if (neighbor === undefined) {
          continue;
        }
        const neighborIndex = index.get(neighbor);
        if (neighborIndex === undefined) {
          visit(neighbor);
          work.push({ id: neighbor, next: 0 });
        } else if (onStack.has(neighbor)) {
          lowLink.set(frame.id, Math.min(low(frame.id), neighborIndex));
        }
        continue;
      }

      work.pop();
      const parent = work[work.length - 1];
      if (parent) {
        lowLink.set(parent.id, Math.min(low(parent.id), low(frame.id)));
      }
      if (low(frame.id) !== index.get(frame.id)) {
        continue;
      }
      for (;;) {
        const member = stack.pop();
        if (member === undefined) {
          break;
        }
        onStack.delete(member);
        component.set(member, nextComponent);
        if (member === frame.id) {
          break;
        }
      }
      nextComponent += 1;
    }
  }

  return component;
}
