import type { PertGraph } from "../types";
import { nodesInOrder } from "./pert";

export interface TimelineRow {
  id: string;
  title: string;
  start: number;
  finish: number;
  slack: number;
  is_critical: boolean;
}

export interface Timeline {
  rows: TimelineRow[];
  project_finish: number;
}

/** Gantt rows from the CPM metrics; a cyclic graph has none. */
export function toTimeline(graph: PertGraph): Timeline {
  return {
    rows: nodesInOrder(graph).map((node) => ({
      id: node.id,
      title: node.title,
      start: node.earliest_start,
      finish: node.earliest_finish,
      slack: node.slack,
      is_critical: node.is_critical,
    })),
    project_finish: graph.project_finish,
  };
}
