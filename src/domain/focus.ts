import type {
  FocusDirection,
  FocusOptions,
  FocusResult,
  PertEdge,
  PertGraph,
  PertNode,
} from "../types";
import { compareIds } from "./edges";

export const MIN_FOCUS_DEPTH = 1;
export const MAX_FOCUS_DEPTH = 10;

export function clampFocusDepth(depth: number): number {
  if (!Number.isFinite(depth)) {
    return MIN_FOCUS_DEPTH;
  }
  return Math.min(MAX_FOCUS_DEPTH, Math.max(MIN_FOCUS_DEPTH, Math.floor(depth)));
}

/**
 * Neighbourhood of one node, bounded by depth.
 *
 * Direction semantics:
 * - "upstream"   = follow incoming edges (what has to finish first)
 * - "downstream" = follow outgoing edges (what waits on this node)
 * - "both"       = follow incoming and outgoing edges at every step
 *
 * Runs on the already-built graph and leaves its metrics untouched. An id
 * that is not in the graph yields an empty result.
 */
export function extractFocus(graph: PertGraph, options: FocusOptions): FocusResult {
  const depth = clampFocusDepth(options.depth);
  const empty: FocusResult = {
    root: options.id,
    direction: options.direction,
    depth,
    node_ids: [],
    edges: [],
  };
  if (!graph.nodes.has(options.id)) {
    return empty;
  }

  const visited = new Set<string>([options.id]);
  let frontier = [options.id];
  for (let level = 0; level < depth && frontier.length > 0; level += 1) {
    const next: string[] = [];
    for (const id of frontier) {
      for (const neighbor of neighbors(graph, id, options.direction)) {
        if (!visited.has(neighbor)) {
          visited.add(neighbor);
          next.push(neighbor);
        }
      }
    }
    frontier = next;
  }

  return {
    ...empty,
    node_ids: orderIds(graph, visited),
    edges: inducedEdges(graph.edges, visited),
  };
}

/** Induced subgraph over `ids`, carrying the metrics already computed. */
export function filterGraph(graph: PertGraph, ids: Iterable<string>): PertGraph {
  const keep = new Set(ids);
  const nodes = new Map<string, PertNode>();
  const successors = new Map<string, string[]>();
  const predecessors = new Map<string, string[]>();
  for (const [id, node] of graph.nodes) {
    if (keep.has(id)) {
      nodes.set(id, { ...node });
      successors.set(id, []);
      predecessors.set(id, []);
    }
  }

  const edges = inducedEdges(graph.edges, nodes);
  for (const edge of edges) {
    successors.get(edge.from)?.push(edge.to);
    predecessors.get(edge.to)?.push(edge.from);
  }

  return {
    nodes,
    edges,
    successors,
    predecessors,
    topological_order: graph.topological_order.filter((id) => nodes.has(id)),
    critical_path: graph.critical_path.filter((id) => nodes.has(id)),
    critical_edges: inducedEdges(graph.critical_edges, nodes),
    cycle_detection: {
      has_cycle: graph.cycle_detection.has_cycle,
      cycle_edges: inducedEdges(graph.cycle_detection.cycle_edges, nodes),
    },
    routes: graph.routes.filter((route) => nodes.has(route.from) && nodes.has(route.to)),
    project_finish: graph.project_finish,
  };
}

function neighbors(graph: PertGraph, id: string, direction: FocusDirection): string[] {
  switch (direction) {
    case "upstream":
      return graph.predecessors.get(id) ?? [];
    case "downstream":
      return graph.successors.get(id) ?? [];
    case "both":
      return [...(graph.predecessors.get(id) ?? []), ...(graph.successors.get(id) ?? [])];
  }
}

function orderIds(graph: PertGraph, ids: Set<string>): string[] {
  if (graph.topological_order.length > 0) {
    return graph.topological_order.filter((id) => ids.has(id));
  }
  return [...ids].sort(compareIds);
}

function inducedEdges(edges: PertEdge[], ids: { has(id: string): boolean }): PertEdge[] {
  return edges
    .filter((edge) => ids.has(edge.from) && ids.has(edge.to))
    .map((edge) => ({ from: edge.from, to: edge.to }));
}
