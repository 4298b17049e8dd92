import type {
  CycleDetection,
  EdgeRoute,
  IssueRecord,
  LayoutSpacing,
  PertEdge,
  PertGraph,
  PertNode,
} from "../types";
import { computeSchedule } from "./cpm";
import { detectCycles } from "./cycles";
import { buildGraph } from "./graph-builder";
import { assignLayout, DEFAULT_SPACING } from "./layout";
import { topologicalOrder } from "./topo";

export interface PertOptions {
  defaultDuration?: number;
  deadline?: number;
  spacing?: LayoutSpacing;
}

/**
 * Full pipeline: build, check for cycles, then order, schedule and lay out.
 * A cyclic graph comes back with its cycle report and nothing else
 * computed: empty order, zeroed metrics, no critical flags.
 */
export function buildPertGraph(issues: IssueRecord[], options: PertOptions = {}): PertGraph {
  const graph = buildGraph(issues, { defaultDuration: options.defaultDuration });
  graph.cycle_detection = detectCycles(graph);
  if (graph.cycle_detection.has_cycle) {
    return graph;
  }

  const order = topologicalOrder(graph);
  const schedule = computeSchedule(graph, order, { deadline: options.deadline });
  graph.topological_order = order;
  graph.project_finish = schedule.project_finish;
  graph.critical_path = schedule.critical_path;
  graph.critical_edges = schedule.critical_edges;
  graph.routes = assignLayout(graph, order, options.spacing ?? DEFAULT_SPACING);
  return graph;
}

/** Nodes in topological order; empty for a cyclic graph. */
export function nodesInOrder(graph: PertGraph): PertNode[] {
  return graph.topological_order
    .map((id) => graph.nodes.get(id))
    .filter((node): node is PertNode => node !== undefined);
}

export function criticalPathNodes(graph: PertGraph): PertNode[] {
  return graph.critical_path
    .map((id) => graph.nodes.get(id))
    .filter((node): node is PertNode => node !== undefined);
}

export interface SerializedGraph {
  nodes: Record<string, PertNode>;
  edges: PertEdge[];
  topological_order: string[];
  critical_path: string[];
  critical_edges: PertEdge[];
  cycle_detection: {
    has_cycle: boolean;
    cycle_edges: Array<[string, string]>;
  };
  routes: EdgeRoute[];
  project_finish: number;
}

/** Plain-object form for JSON output; ids become record keys. */
export function serializeGraph(graph: PertGraph): SerializedGraph {
  return {
    nodes: Object.fromEntries(
      [...graph.nodes].map(([id, node]): [string, PertNode] => [id, { ...node }]),
    ),
    edges: graph.edges.map((edge) => ({ ...edge })),
    topological_order: [...graph.topological_order],
    critical_path: [...graph.critical_path],
    critical_edges: graph.critical_edges.map((edge) => ({ ...edge })),
    cycle_detection: serializeCycles(graph.cycle_detection),
    routes: graph.routes.map((route) => ({ ...route })),
    project_finish: graph.project_finish,
  };
}

function serializeCycles(detection: CycleDetection): SerializedGraph["cycle_detection"] {
  return {
    has_cycle: detection.has_cycle,
    cycle_edges: detection.cycle_edges.map((edge): [string, string] => [edge.from, edge.to]),
  };
}
