import type { PertEdge, PertGraph, PertNode } from "../types";

/** Tolerance, in hours, when comparing a node's slack against the minimum. */
export const CRITICAL_EPSILON = 1e-6;

export interface ScheduleOptions {
  /**
   * Externally imposed completion time in hours. Sinks must finish by it
   * instead of by the project's own earliest finish.
   */
  deadline?: number;
}

export interface ScheduleResult {
  project_finish: number;
  min_slack: number;
  critical_path: string[];
  critical_edges: PertEdge[];
}

/**
 * Critical Path Method over an acyclic graph, writing timing fields onto
 * the graph's nodes.
 *
 * Forward pass in topological order sets earliest start/finish; backward
 * pass in reverse order sets latest start/finish. A node is critical when
 * its slack sits within CRITICAL_EPSILON of the smallest slack in the graph,
 * which is 0 unless a deadline shifts every path.
 */
export function computeSchedule(
  graph: PertGraph,
  order: string[],
  options: ScheduleOptions = {},
): ScheduleResult {
  const ordered = order
    .map((id) => graph.nodes.get(id))
    .filter((node): node is PertNode => node !== undefined);

  for (const node of ordered) {
    let start = 0;
    for (const id of graph.predecessors.get(node.id) ?? []) {
      const predecessor = graph.nodes.get(id);
      if (predecessor && predecessor.earliest_finish > start) {
        start = predecessor.earliest_finish;
      }
    }
    node.earliest_start = start;
    node.earliest_finish = start + node.duration;
  }

  let projectFinish = 0;
  for (const node of ordered) {
    if ((graph.successors.get(node.id)?.length ?? 0) === 0) {
      projectFinish = Math.max(projectFinish, node.earliest_finish);
    }
  }
  const horizon =
    typeof options.deadline === "number" && Number.isFinite(options.deadline)
      ? options.deadline
      : projectFinish;

  for (let idx = ordered.length - 1; idx >= 0; idx -= 1) {
    const node = ordered[idx];
    if (!node) {
      continue;
    }
    let finish: number | undefined;
    for (const id of graph.successors.get(node.id) ?? []) {
      const successor = graph.nodes.get(id);
      if (successor && (finish === undefined || successor.latest_start < finish)) {
        finish = successor.latest_start;
      }
    }
    node.latest_finish = finish ?? horizon;
    node.latest_start = node.latest_finish - node.duration;
    node.slack = node.latest_start - node.earliest_start;
  }

  const minSlack =
    ordered.length > 0
      ? ordered.reduce((min, node) => Math.min(min, node.slack), Number.POSITIVE_INFINITY)
      : 0;
  const criticalPath: string[] = [];
  for (const node of ordered) {
    node.is_critical = Math.abs(node.slack - minSlack) <= CRITICAL_EPSILON;
    if (node.is_critical) {
      criticalPath.push(node.id);
    }
  }

  const criticalEdges = graph.edges
    .filter(
      (edge) =>
        graph.nodes.get(edge.from)?.is_critical === true &&
        graph.nodes.get(edge.to)?.is_critical === true,
    )
    .map((edge) => ({ from: edge.from, to: edge.to }));

  return {
    project_finish: projectFinish,
    min_slack: minSlack,
    critical_path: criticalPath,
    critical_edges: criticalEdges,
  };
}
