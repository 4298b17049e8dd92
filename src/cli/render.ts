import pc from "picocolors";
import type { CriticalResult, CycleResult, FocusView, PertResult } from "../app/service";
import { formatEdge } from "../domain/edges";
import { nodesInOrder } from "../domain/pert";
import type { Timeline } from "../domain/timeline";
import type { PertEdge, PertNode } from "../types";

const DEFAULT_WIDTH = 120;
const MIN_BAR_WIDTH = 10;

export function resolveWidth(raw?: number): number {
  if (typeof raw === "number" && Number.isFinite(raw) && raw > 0) {
    return Math.floor(raw);
  }
  if (typeof process.stdout.columns === "number" && process.stdout.columns > 0) {
    return process.stdout.columns;
  }
  return DEFAULT_WIDTH;
}

export function formatHours(value: number): string {
  if (Number.isInteger(value)) {
    return String(value);
  }
  return String(Number(value.toFixed(2)));
}

function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

export function renderCycleReport(cycles: string[], cycleEdges: PertEdge[]): string[] {
  if (cycleEdges.length === 0) {
    return [pc.dim("no cycles")];
  }
  const lines = cycles.map((cycle) => pc.red(`cycle detected: ${cycle}`));
  lines.push(`cycle_edges=${cycleEdges.map(formatEdge).join(", ")}`);
  lines.push(pc.dim("fix the dependencies above to see the schedule"));
  return lines;
}

export function renderPertGraph(result: PertResult): string[] {
  const { graph } = result;
  const lines = result.warnings.map((warning) => pc.yellow(`warning: ${warning}`));
  if (graph.nodes.size === 0) {
    lines.push(pc.dim("no issues to display"));
    return lines;
  }
  if (graph.cycle_detection.has_cycle) {
    lines.push(...renderCycleReport(result.cycles, graph.cycle_detection.cycle_edges));
    return lines;
  }

  lines.push(...renderScheduleTable(nodesInOrder(graph)));
  lines.push(
    pc.dim(
      `project_finish=${formatHours(graph.project_finish)}h critical=${graph.critical_path.join(" → ")}`,
    ),
  );
  return lines;
}

function renderScheduleTable(nodes: PertNode[]): string[] {
  const header = ["ID", "ES", "EF", "LS", "LF", "SLACK", "X", "Y", "TITLE"];
  const rows = nodes.map((node) => [
    node.is_critical ? `*${node.id}` : node.id,
    formatHours(node.earliest_start),
    formatHours(node.earliest_finish),
    formatHours(node.latest_start),
    formatHours(node.latest_finish),
    formatHours(node.slack),
    String(node.x),
    String(node.y),
    node.title,
  ]);
  const table = [header, ...rows];
  const widths = header.map((_, idx) => Math.max(...table.map((row) => row[idx]?.length ?? 0)));

  const lines: string[] = [];
  for (let rowIdx = 0; rowIdx < table.length; rowIdx += 1) {
    const row = table[rowIdx];
    if (!row) {
      continue;
    }
    const line = row
      .map((cell, idx) => cell.padEnd(widths[idx] ?? cell.length))
      .join("  ")
      .trimEnd();
    if (rowIdx === 0) {
      lines.push(pc.bold(line));
    } else if (nodes[rowIdx - 1]?.is_critical) {
      lines.push(pc.red(line));
    } else {
      lines.push(line);
    }
  }
  return lines;
}

export function renderOrder(nodes: PertNode[]): string[] {
  if (nodes.length === 0) {
    return [pc.dim("no issues to display")];
  }
  return nodes.map((node, idx) => `${idx + 1}. ${pc.bold(node.id)} ${node.title}`);
}

export function renderCritical(result: CriticalResult): string[] {
  if (result.nodes.length === 0) {
    return [pc.dim("no issues to display")];
  }
  const lines = result.nodes.map(
    (node) =>
      `${pc.red(node.id)} ${node.title} ${pc.dim(`[${formatHours(node.earliest_start)}-${formatHours(node.earliest_finish)}h]`)}`,
  );
  lines.push(pc.dim(`project_finish=${formatHours(result.project_finish)}h`));
  return lines;
}

export function renderFocus(view: FocusView): string[] {
  const { focus, graph } = view;
  const lines = [
    `${pc.bold(focus.root)} focus=${focus.direction} depth=${focus.depth} nodes=${focus.node_ids.length}`,
  ];
  for (const id of focus.node_ids) {
    const node = graph.nodes.get(id);
    if (!node) {
      continue;
    }
    const marker = id === focus.root ? ">" : " ";
    const badge = graph.cycle_detection.has_cycle
      ? ""
      : pc.dim(` [slack=${formatHours(node.slack)}${node.is_critical ? " critical" : ""}]`);
    lines.push(`${marker} ${id} ${node.title}${badge}`);
  }
  for (const edge of focus.edges) {
    lines.push(pc.dim(`  ${formatEdge(edge)}`));
  }
  return lines;
}

export function renderTimeline(timeline: Timeline, width?: number): string[] {
  if (timeline.rows.length === 0) {
    return [pc.dim("no issues to display")];
  }
  const idWidth = Math.max(...timeline.rows.map((row) => row.id.length));
  const barWidth = Math.max(MIN_BAR_WIDTH, resolveWidth(width) - idWidth - 20);
  const scale = timeline.project_finish > 0 ? barWidth / timeline.project_finish : 0;

  const lines = timeline.rows.map((row) => {
    const startCol = Math.round(row.start * scale);
    const endCol = Math.max(startCol + 1, Math.round(row.finish * scale));
    const fill = (row.is_critical ? "█" : "░").repeat(endCol - startCol);
    const bar = `${" ".repeat(startCol)}${row.is_critical ? pc.red(fill) : fill}`;
    const padding = " ".repeat(Math.max(0, barWidth - endCol));
    return `${row.id.padEnd(idWidth)} │${bar}${padding}│ ${formatHours(row.start)}-${formatHours(row.finish)}h`;
  });
  lines.push(pc.dim(`project_finish=${formatHours(timeline.project_finish)}h`));
  return lines;
}

export function printPertGraph(result: PertResult): void {
  printLines(renderPertGraph(result));
}

export function printCycleResult(result: CycleResult): void {
  printLines([
    ...result.warnings.map((warning) => pc.yellow(`warning: ${warning}`)),
    ...renderCycleReport(result.cycles, result.cycle_edges),
  ]);
}

export function printOrder(nodes: PertNode[]): void {
  printLines(renderOrder(nodes));
}

export function printCritical(result: CriticalResult): void {
  printLines(renderCritical(result));
}

export function printFocus(view: FocusView): void {
  printLines(renderFocus(view));
}

export function printTimeline(timeline: Timeline, width?: number): void {
  printLines(renderTimeline(timeline, width));
}
