export {
  chartView,
  createPertView,
  cycleFocusDirection,
  decreaseFocusDepth,
  focusOnNode,
  increaseFocusDepth,
  LEGEND,
  MAX_ZOOM,
  MIN_ZOOM,
  pan,
  resetView,
  selectedId,
  selectNext,
  selectPrevious,
  setIssues,
  toggleCriticalPath,
  toggleFocusMode,
  toggleLegend,
  visibleGraph,
  zoomIn,
  zoomOut,
} from "./app/pert-view";
export type {
  ChartEdge,
  ChartNode,
  ChartView,
  FocusState,
  PertViewOptions,
  PertViewState,
  Viewport,
} from "./app/pert-view";
export { loadSnapshot, parseSnapshot } from "./app/snapshot";
export type { IssueSnapshot } from "./app/snapshot";
export { computeSchedule, CRITICAL_EPSILON } from "./domain/cpm";
export type { ScheduleOptions, ScheduleResult } from "./domain/cpm";
export { describeCycles, detectCycles } from "./domain/cycles";
export { clampFocusDepth, extractFocus, filterGraph, MAX_FOCUS_DEPTH } from "./domain/focus";
export { buildGraph, DEFAULT_DURATION_HOURS } from "./domain/graph-builder";
export type { BuildOptions } from "./domain/graph-builder";
export { assignLayout, DEFAULT_SPACING } from "./domain/layout";
export {
  buildPertGraph,
  criticalPathNodes,
  nodesInOrder,
  serializeGraph,
} from "./domain/pert";
export type { PertOptions, SerializedGraph } from "./domain/pert";
export { toTimeline } from "./domain/timeline";
export type { Timeline, TimelineRow } from "./domain/timeline";
export { topologicalOrder } from "./domain/topo";
export { IgraphError } from "./errors";
export * from "./types";
