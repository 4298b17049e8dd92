import { clampFocusDepth, extractFocus, filterGraph } from "../domain/focus";
import { buildPertGraph, nodesInOrder, type PertOptions } from "../domain/pert";
import type { FocusDirection, IssueRecord, PertGraph } from "../types";

export interface FocusState {
  enabled: boolean;
  direction: FocusDirection;
  depth: number;
  /** Node pinned when focus was turned on; selection moves leave it alone. */
  node?: string;
}

export interface Viewport {
  offsetX: number;
  offsetY: number;
  zoom: number;
}

export interface PertViewState {
  issues: IssueRecord[];
  options: PertOptions;
  graph: PertGraph;
  /** Index into `graph.topological_order`. */
  selectedIndex: number;
  focus: FocusState;
  viewport: Viewport;
  showCriticalPath: boolean;
  showLegend: boolean;
}

export interface PertViewOptions extends PertOptions {
  focusDirection?: FocusDirection;
  focusDepth?: number;
}

export const MIN_ZOOM = 0.5;
export const MAX_ZOOM = 3;
const ZOOM_IN_FACTOR = 1.2;
const ZOOM_OUT_FACTOR = 0.8;

export const LEGEND = ["Dependency", "Critical Path", "Normal", "Selected"] as const;

const DIRECTION_CYCLE: readonly FocusDirection[] = ["upstream", "downstream", "both"];

export function createPertView(
  issues: IssueRecord[],
  options: PertViewOptions = {},
): PertViewState {
  const { focusDirection, focusDepth, ...pertOptions } = options;
  return {
    issues,
    options: pertOptions,
    graph: buildPertGraph(issues, pertOptions),
    selectedIndex: 0,
    focus: {
      enabled: false,
      direction: focusDirection ?? "both",
      depth: clampFocusDepth(focusDepth ?? 1),
    },
    viewport: initialViewport(),
    showCriticalPath: true,
    showLegend: true,
  };
}

/**
 * Rebuild from a new snapshot. The selection is clamped to the last node;
 * focus is dropped when the pinned node is gone.
 */
export function setIssues(state: PertViewState, issues: IssueRecord[]): PertViewState {
  const graph = buildPertGraph(issues, state.options);
  const count = graph.topological_order.length;
  const pinned = state.focus.node;
  const focus =
    pinned !== undefined && !graph.nodes.has(pinned)
      ? { enabled: false, direction: state.focus.direction, depth: state.focus.depth }
      : state.focus;
  return {
    ...state,
    issues,
    graph,
    selectedIndex: count > 0 ? Math.min(state.selectedIndex, count - 1) : 0,
    focus,
  };
}

export function selectedId(state: PertViewState): string | undefined {
  return state.graph.topological_order[state.selectedIndex];
}

export function selectNext(state: PertViewState): PertViewState {
  return moveSelection(state, 1);
}

export function selectPrevious(state: PertViewState): PertViewState {
  return moveSelection(state, -1);
}

export function cycleFocusDirection(state: PertViewState): PertViewState {
  const index = DIRECTION_CYCLE.indexOf(state.focus.direction);
  const direction = DIRECTION_CYCLE[(index + 1) % DIRECTION_CYCLE.length] ?? "both";
  return { ...state, focus: { ...state.focus, direction } };
}

export function increaseFocusDepth(state: PertViewState): PertViewState {
  return withDepth(state, state.focus.depth + 1);
}

export function decreaseFocusDepth(state: PertViewState): PertViewState {
  return withDepth(state, state.focus.depth - 1);
}

/** Turning focus on pins the current selection; turning it off unpins. */
export function toggleFocusMode(state: PertViewState): PertViewState {
  const { enabled, direction, depth } = state.focus;
  if (enabled) {
    return { ...state, focus: { enabled: false, direction, depth } };
  }
  const node = selectedId(state);
  const focus: FocusState = { enabled: true, direction, depth };
  if (node !== undefined) {
    focus.node = node;
  }
  return { ...state, focus };
}

/** Pin focus on a node by id; unknown ids leave the state as it is. */
export function focusOnNode(state: PertViewState, id: string): PertViewState {
  if (!state.graph.nodes.has(id)) {
    return state;
  }
  return { ...state, focus: { ...state.focus, enabled: true, node: id } };
}

/** The graph to draw: the pinned neighbourhood when focus is on, else everything. */
export function visibleGraph(state: PertViewState): PertGraph {
  const id = state.focus.node;
  if (!state.focus.enabled || id === undefined) {
    return state.graph;
  }
  const focus = extractFocus(state.graph, {
    id,
    direction: state.focus.direction,
    depth: state.focus.depth,
  });
  return filterGraph(state.graph, focus.node_ids);
}

export function pan(state: PertViewState, dx: number, dy: number): PertViewState {
  const { viewport } = state;
  return {
    ...state,
    viewport: { ...viewport, offsetX: viewport.offsetX + dx, offsetY: viewport.offsetY + dy },
  };
}

export function zoomIn(state: PertViewState): PertViewState {
  return withZoom(state, state.viewport.zoom * ZOOM_IN_FACTOR);
}

export function zoomOut(state: PertViewState): PertViewState {
  return withZoom(state, state.viewport.zoom * ZOOM_OUT_FACTOR);
}

export function resetView(state: PertViewState): PertViewState {
  return { ...state, viewport: initialViewport() };
}

export function toggleCriticalPath(state: PertViewState): PertViewState {
  return { ...state, showCriticalPath: !state.showCriticalPath };
}

export function toggleLegend(state: PertViewState): PertViewState {
  return { ...state, showLegend: !state.showLegend };
}

export interface ChartNode {
  id: string;
  title: string;
  x: number;
  y: number;
  isCritical: boolean;
  isSelected: boolean;
}

export interface ChartEdge {
  from: string;
  to: string;
  fromX: number;
  fromY: number;
  toX: number;
  toY: number;
  isCritical: boolean;
}

export interface ChartView {
  nodes: ChartNode[];
  edges: ChartEdge[];
  legend: string[];
}

/**
 * Screen-space model of the visible graph: layout coordinates scaled by
 * the zoom and shifted by the pan offset. Critical highlighting follows
 * `showCriticalPath`; the legend is empty while hidden.
 */
export function chartView(state: PertViewState): ChartView {
  const graph = visibleGraph(state);
  const selected = selectedId(state);
  const { offsetX, offsetY, zoom } = state.viewport;
  const toScreenX = (value: number): number => Math.floor(value * zoom) - offsetX;
  const toScreenY = (value: number): number => Math.floor(value * zoom) - offsetY;
  const highlight = (id: string): boolean =>
    state.showCriticalPath && graph.nodes.get(id)?.is_critical === true;

  return {
    nodes: nodesInOrder(graph).map((node) => ({
      id: node.id,
      title: node.title,
      x: toScreenX(node.x),
      y: toScreenY(node.y),
      isCritical: highlight(node.id),
      isSelected: node.id === selected,
    })),
    edges: graph.routes.map((route) => ({
      from: route.from,
      to: route.to,
      fromX: toScreenX(route.from_x),
      fromY: toScreenY(route.from_y),
      toX: toScreenX(route.to_x),
      toY: toScreenY(route.to_y),
      isCritical: highlight(route.from) && highlight(route.to),
    })),
    legend: state.showLegend ? [...LEGEND] : [],
  };
}

function initialViewport(): Viewport {
  return { offsetX: 0, offsetY: 0, zoom: 1 };
}

function moveSelection(state: PertViewState, step: 1 | -1): PertViewState {
  const count = state.graph.topological_order.length;
  if (count === 0) {
    return state;
  }
  return { ...state, selectedIndex: (state.selectedIndex + step + count) % count };
}

function withDepth(state: PertViewState, depth: number): PertViewState {
  return { ...state, focus: { ...state.focus, depth: clampFocusDepth(depth) } };
}

function withZoom(state: PertViewState, zoom: number): PertViewState {
  return {
    ...state,
    viewport: { ...state.viewport, zoom: Math.min(MAX_ZOOM, Math.max(MIN_ZOOM, zoom)) },
  };
}
