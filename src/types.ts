export const SCHEMA_VERSION = 1;

export type IssueStatus = "open" | "in_progress" | "blocked" | "closed";
export type IssueType = "bug" | "feature" | "task" | "epic" | "chore";
export type Priority = 0 | 1 | 2 | 3 | 4;
export type FocusDirection = "upstream" | "downstream" | "both";

/** One issue of a tracker snapshot, as handed to the graph engine. */
export interface IssueRecord {
  id: string;
  title: string;
  /** Estimated effort; absent or non-positive values fall back to the default duration. */
  duration_hours?: number;
  /** Ids this issue is blocked by. */
  dependencies: string[];
  /** Ids this issue blocks. */
  blocks: string[];
  status?: IssueStatus;
  priority?: Priority;
  issue_type?: IssueType;
  assignee?: string;
  labels?: string[];
  created_at?: string;
  updated_at?: string;
}

export interface PertNode {
  id: string;
  title: string;
  status?: IssueStatus;
  /** Hours, always > 0. */
  duration: number;
  earliest_start: number;
  earliest_finish: number;
  latest_start: number;
  latest_finish: number;
  slack: number;
  is_critical: boolean;
  /** Longest-path distance from a source node. */
  rank: number;
  x: number;
  y: number;
}

/** `from` must complete before `to` starts. */
export interface PertEdge {
  from: string;
  to: string;
}

export interface CycleDetection {
  has_cycle: boolean;
  cycle_edges: PertEdge[];
}

export interface EdgeRoute {
  from: string;
  to: string;
  from_x: number;
  from_y: number;
  to_x: number;
  to_y: number;
  /** Rank difference between the endpoints; above 1 the arrow skips columns. */
  span: number;
}

export interface PertGraph {
  nodes: Map<string, PertNode>;
  edges: PertEdge[];
  /** id -> ids it blocks */
  successors: Map<string, string[]>;
  /** id -> ids blocking it */
  predecessors: Map<string, string[]>;
  /** Empty while `cycle_detection.has_cycle` is true. */
  topological_order: string[];
  critical_path: string[];
  critical_edges: PertEdge[];
  cycle_detection: CycleDetection;
  routes: EdgeRoute[];
  project_finish: number;
}

export interface FocusOptions {
  id: string;
  direction: FocusDirection;
  depth: number;
}

export interface FocusResult {
  root: string;
  direction: FocusDirection;
  /** Depth after clamping. */
  depth: number;
  node_ids: string[];
  edges: PertEdge[];
}

export interface LayoutSpacing {
  x: number;
  y: number;
}

export interface Config {
  schema_version: number;
  default_duration_hours: number;
  focus_depth: number;
  focus_direction: FocusDirection;
  spacing: LayoutSpacing;
}

export interface EnvelopeOk<T> {
  schema_version: number;
  command: string;
  ok: true;
  data: T;
}

export interface EnvelopeErr {
  schema_version: number;
  command: string;
  ok: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export type Envelope<T> = EnvelopeOk<T> | EnvelopeErr;
