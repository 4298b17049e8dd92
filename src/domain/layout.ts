import type { EdgeRoute, LayoutSpacing, PertGraph } from "../types";

export const DEFAULT_SPACING: LayoutSpacing = { x: 4, y: 3 };

/**
 * Column-per-rank layout. A node's rank is its longest-path distance from
 * a source, so parallel chains line up by dependency depth. Inside a rank
 * nodes stack top to bottom in topological order, one `spacing.y` apart.
 *
 * This is a placement heuristic; no crossing minimisation is attempted.
 */
export function assignLayout(
  graph: PertGraph,
  order: string[],
  spacing: LayoutSpacing = DEFAULT_SPACING,
): EdgeRoute[] {
  const rank = new Map<string, number>();
  for (const id of order) {
    let value = 0;
    for (const predecessor of graph.predecessors.get(id) ?? []) {
      value = Math.max(value, (rank.get(predecessor) ?? 0) + 1);
    }
    rank.set(id, value);
  }

  const slots = new Map<number, number>();
  for (const id of order) {
    const node = graph.nodes.get(id);
    if (!node) {
      continue;
    }
    const nodeRank = rank.get(id) ?? 0;
    const slot = slots.get(nodeRank) ?? 0;
    slots.set(nodeRank, slot + 1);
    node.rank = nodeRank;
    node.x = nodeRank * spacing.x;
    node.y = slot * spacing.y;
  }

  const routes: EdgeRoute[] = [];
  for (const edge of graph.edges) {
    const from = graph.nodes.get(edge.from);
    const to = graph.nodes.get(edge.to);
    if (!from || !to) {
      continue;
    }
    routes.push({
      from: from.id,
      to: to.id,
      from_x: from.x,
      from_y: from.y,
      to_x: to.x,
      to_y: to.y,
      span: to.rank - from.rank,
    });
  }
  return routes;
}
