import { describe, expect, it } from "vitest";
import {
  chartView,
  createPertView,
  cycleFocusDirection,
  decreaseFocusDepth,
  focusOnNode,
  increaseFocusDepth,
  pan,
  resetView,
  selectNext,
  selectPrevious,
  selectedId,
  setIssues,
  toggleCriticalPath,
  toggleFocusMode,
  toggleLegend,
  visibleGraph,
  zoomIn,
  zoomOut,
} from "../src/app/pert-view";
import { makeIssue } from "./helpers";

const chain = () => [
  makeIssue("A", { duration_hours: 2, blocks: ["B"] }),
  makeIssue("B", { duration_hours: 3, blocks: ["C"] }),
  makeIssue("C", { duration_hours: 1 }),
];

const visibleIds = (graph: ReturnType<typeof visibleGraph>): string[] => [...graph.nodes.keys()];

describe("pert view state", () => {
  it("starts on the first node with focus off", () => {
    const state = createPertView(chain());

    expect(selectedId(state)).toBe("A");
    expect(state.focus).toEqual({ enabled: false, direction: "both", depth: 1 });
    expect(state.viewport).toEqual({ offsetX: 0, offsetY: 0, zoom: 1 });
    expect(state.showCriticalPath).toBe(true);
    expect(state.showLegend).toBe(true);
    expect(visibleGraph(state)).toBe(state.graph);
  });

  it("takes the initial focus settings and clamps the depth", () => {
    const state = createPertView(chain(), { focusDirection: "upstream", focusDepth: 25 });

    expect(state.focus).toEqual({ enabled: false, direction: "upstream", depth: 10 });
  });

  it("wraps the selection in both directions", () => {
    const state = createPertView(chain());

    expect(selectedId(selectNext(state))).toBe("B");
    expect(selectedId(selectNext(selectNext(selectNext(state))))).toBe("A");
    expect(selectedId(selectPrevious(state))).toBe("C");
  });

  it("keeps the selection still when there is nothing to select", () => {
    const state = createPertView([]);

    expect(selectNext(state)).toBe(state);
    expect(selectPrevious(state)).toBe(state);
    expect(selectedId(state)).toBeUndefined();
    expect(visibleGraph(toggleFocusMode(state)).nodes.size).toBe(0);
  });

  it("cycles the focus direction", () => {
    const state = createPertView(chain());

    const first = cycleFocusDirection(state);
    const second = cycleFocusDirection(first);
    const third = cycleFocusDirection(second);
    expect([first.focus.direction, second.focus.direction, third.focus.direction]).toEqual([
      "upstream",
      "downstream",
      "both",
    ]);
  });

  it("keeps the focus depth within bounds", () => {
    let state = createPertView(chain());

    state = decreaseFocusDepth(state);
    expect(state.focus.depth).toBe(1);
    for (let step = 0; step < 15; step += 1) {
      state = increaseFocusDepth(state);
    }
    expect(state.focus.depth).toBe(10);
  });

  it("draws only the focused neighbourhood when focus is on", () => {
    const state = toggleFocusMode(cycleFocusDirection(selectNext(createPertView(chain()))));

    const graph = visibleGraph(state);
    expect(state.focus).toEqual({ enabled: true, direction: "upstream", depth: 1, node: "B" });
    expect(visibleIds(graph)).toEqual(["A", "B"]);
    expect(graph.edges).toEqual([{ from: "A", to: "B" }]);
    expect(graph.nodes.get("B")?.earliest_start).toBe(2);
  });

  it("keeps the focused node pinned while the selection moves", () => {
    const focused = toggleFocusMode(
      createPertView(chain(), { focusDirection: "downstream", focusDepth: 1 }),
    );
    expect(visibleIds(visibleGraph(focused))).toEqual(["A", "B"]);

    const moved = selectNext(focused);
    expect(selectedId(moved)).toBe("B");
    expect(moved.focus.node).toBe("A");
    expect(visibleIds(visibleGraph(moved))).toEqual(["A", "B"]);
  });

  it("pins the new selection when focus is turned off and on again", () => {
    const focused = toggleFocusMode(createPertView(chain(), { focusDirection: "downstream" }));

    const refocused = toggleFocusMode(toggleFocusMode(selectNext(focused)));
    expect(refocused.focus.node).toBe("B");
    expect(visibleIds(visibleGraph(refocused))).toEqual(["B", "C"]);
  });

  it("focuses on a node by id", () => {
    const state = createPertView(chain(), { focusDirection: "upstream" });

    const focused = focusOnNode(state, "C");
    expect(focused.focus).toEqual({ enabled: true, direction: "upstream", depth: 1, node: "C" });
    expect(visibleIds(visibleGraph(focused))).toEqual(["B", "C"]);
    expect(focusOnNode(state, "missing")).toBe(state);
  });

  it("clamps the selection when a new snapshot has fewer nodes", () => {
    const state = selectPrevious(createPertView(chain(), { defaultDuration: 4 }));

    const next = setIssues(state, [makeIssue("A", { blocks: ["B"] }), makeIssue("B")]);
    expect(next.selectedIndex).toBe(1);
    expect(selectedId(next)).toBe("B");
    expect(next.graph.nodes.get("A")?.duration).toBe(4);
  });

  it("drops focus when the pinned node leaves the snapshot", () => {
    const focused = toggleFocusMode(selectPrevious(createPertView(chain())));
    expect(focused.focus.node).toBe("C");

    const next = setIssues(focused, [makeIssue("A", { blocks: ["B"] }), makeIssue("B")]);
    expect(next.focus).toEqual({ enabled: false, direction: "both", depth: 1 });
    expect(visibleGraph(next)).toBe(next.graph);

    const kept = setIssues(focused, chain());
    expect(kept.focus.node).toBe("C");
  });

  it("resets the selection when a new snapshot is cyclic", () => {
    const state = selectNext(createPertView(chain()));

    const next = setIssues(state, [
      makeIssue("A", { blocks: ["B"] }),
      makeIssue("B", { blocks: ["A"] }),
    ]);
    expect(next.selectedIndex).toBe(0);
    expect(selectedId(next)).toBeUndefined();
    expect(next.graph.cycle_detection.has_cycle).toBe(true);
  });
});

describe("pert viewport", () => {
  it("accumulates pan offsets", () => {
    const state = pan(pan(createPertView(chain()), 5, -2), 3, 4);

    expect(state.viewport).toEqual({ offsetX: 8, offsetY: 2, zoom: 1 });
  });

  it("zooms by fixed factors within 0.5..3", () => {
    const state = createPertView(chain());

    expect(zoomIn(state).viewport.zoom).toBeCloseTo(1.2);
    expect(zoomOut(state).viewport.zoom).toBeCloseTo(0.8);

    let zoomed = state;
    for (let step = 0; step < 10; step += 1) {
      zoomed = zoomIn(zoomed);
    }
    expect(zoomed.viewport.zoom).toBe(3);

    let shrunk = state;
    for (let step = 0; step < 10; step += 1) {
      shrunk = zoomOut(shrunk);
    }
    expect(shrunk.viewport.zoom).toBe(0.5);
  });

  it("resets pan and zoom but keeps the other settings", () => {
    const moved = toggleLegend(zoomIn(pan(createPertView(chain()), 7, 7)));

    const reset = resetView(moved);
    expect(reset.viewport).toEqual({ offsetX: 0, offsetY: 0, zoom: 1 });
    expect(reset.showLegend).toBe(false);
  });

  it("projects layout coordinates through zoom and pan", () => {
    const state = pan(zoomIn(createPertView(chain())), 1, 0);

    const view = chartView(state);
    expect(view.nodes.map((node) => [node.id, node.x, node.y])).toEqual([
      ["A", -1, 0],
      ["B", 3, 0],
      ["C", 8, 0],
    ]);
    expect(view.edges[0]).toEqual({
      from: "A",
      to: "B",
      fromX: -1,
      fromY: 0,
      toX: 3,
      toY: 0,
      isCritical: true,
    });
    expect(view.nodes[0]?.isSelected).toBe(true);
  });

  it("hides critical highlighting and the legend when toggled off", () => {
    const state = createPertView(chain());

    expect(chartView(state).legend).toEqual(["Dependency", "Critical Path", "Normal", "Selected"]);
    expect(chartView(state).nodes.every((node) => node.isCritical)).toBe(true);

    const plain = chartView(toggleLegend(toggleCriticalPath(state)));
    expect(plain.legend).toEqual([]);
    expect(plain.nodes.some((node) => node.isCritical)).toBe(false);
    expect(plain.edges.some((edge) => edge.isCritical)).toBe(false);
    expect(toggleCriticalPath(toggleCriticalPath(state)).showCriticalPath).toBe(true);
  });
});
