import type { IssueRecord, PertEdge, PertGraph, PertNode } from "../types";
import { edgeKey, normalizeIdList } from "./edges";

export const DEFAULT_DURATION_HOURS = 24;

export interface BuildOptions {
  /** Hours used for issues without a usable estimate. */
  defaultDuration?: number;
}

/**
 * Build the dependency graph for a snapshot of issues.
 *
 * Both `blocks` and `dependencies` feed the same relation: `A.blocks ∋ B`
 * and `B.dependencies ∋ A` each add the edge A→B. Duplicate edges collapse
 * to one and edges naming an id outside the snapshot are dropped, since
 * they point at issues that are not currently loaded. A repeated issue id
 * keeps its first record.
 */
export function buildGraph(issues: IssueRecord[], options: BuildOptions = {}): PertGraph {
  const defaultDuration = resolveDefaultDuration(options.defaultDuration);
  const nodes = new Map<string, PertNode>();
  const successors = new Map<string, string[]>();
  const predecessors = new Map<string, string[]>();
  const records: IssueRecord[] = [];

  for (const issue of issues) {
    if (nodes.has(issue.id)) {
      continue;
    }
    records.push(issue);
    nodes.set(issue.id, createNode(issue, defaultDuration));
    successors.set(issue.id, []);
    predecessors.set(issue.id, []);
  }

  const edges: PertEdge[] = [];
  const seen = new Set<string>();
  const addEdge = (from: string, to: string): void => {
    const fromList = successors.get(from);
    const toList = predecessors.get(to);
    if (!fromList || !toList) {
      return;
    }
    const key = edgeKey(from, to);
    if (seen.has(key)) {
      return;
    }
    seen.add(key);
    edges.push({ from, to });
    fromList.push(to);
    toList.push(from);
  };

  for (const issue of records) {
    for (const blocker of normalizeIdList(issue.dependencies)) {
      addEdge(blocker, issue.id);
    }
    for (const blocked of normalizeIdList(issue.blocks)) {
      addEdge(issue.id, blocked);
    }
  }

  return {
    nodes,
    edges,
    successors,
    predecessors,
    topological_order: [],
    critical_path: [],
    critical_edges: [],
    cycle_detection: { has_cycle: false, cycle_edges: [] },
    routes: [],
    project_finish: 0,
  };
}

export function resolveDuration(value: number | undefined, fallback: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return value;
  }
  return fallback;
}

function resolveDefaultDuration(value: number | undefined): number {
  return resolveDuration(value, DEFAULT_DURATION_HOURS);
}

function createNode(issue: IssueRecord, defaultDuration: number): PertNode {
  return {
    id: issue.id,
    title: issue.title,
    ...(issue.status === undefined ? {} : { status: issue.status }),
    duration: resolveDuration(issue.duration_hours, defaultDuration),
    earliest_start: 0,
    earliest_finish: 0,
    latest_start: 0,
    latest_finish: 0,
    slack: 0,
    is_critical: false,
    rank: 0,
    x: 0,
    y: 0,
  };
}
