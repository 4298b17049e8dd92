import { describeCycles } from "../domain/cycles";
import { extractFocus, filterGraph } from "../domain/focus";
import { buildPertGraph, criticalPathNodes, nodesInOrder } from "../domain/pert";
import { type Timeline, toTimeline } from "../domain/timeline";
import { IgraphError } from "../errors";
import { type ConfigOverrides, initConfig, readConfig } from "../store/config";
import { PROJECT_DIR } from "../store/paths";
import type {
  Config,
  FocusDirection,
  FocusResult,
  PertEdge,
  PertGraph,
  PertNode,
} from "../types";
import { applyEnvOverrides } from "./runtime";
import { loadSnapshot } from "./snapshot";

export interface InitResult {
  initialized: boolean;
  files: string[];
  config: Config;
}

export interface SnapshotInput {
  snapshot: string;
  deadline?: number;
}

export interface FocusInput extends SnapshotInput {
  id: string;
  direction?: FocusDirection;
  depth?: number;
}

export interface PertResult {
  graph: PertGraph;
  cycles: string[];
  warnings: string[];
}

export interface CycleResult {
  has_cycle: boolean;
  cycle_edges: PertEdge[];
  cycles: string[];
  warnings: string[];
}

export interface CriticalResult {
  project_finish: number;
  nodes: PertNode[];
  edges: PertEdge[];
}

export interface FocusView {
  focus: FocusResult;
  graph: PertGraph;
}

export class GraphService {
  constructor(
    private readonly projectRoot: string,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async init(overrides: ConfigOverrides = {}): Promise<InitResult> {
    const { created, config } = await initConfig(this.projectRoot, overrides);
    return { initialized: true, files: created ? [`${PROJECT_DIR}/config.json`] : [], config };
  }

  async config(): Promise<Config> {
    return applyEnvOverrides(await readConfig(this.projectRoot), this.env);
  }

  async pert(input: SnapshotInput): Promise<PertResult> {
    return this.load(input, await this.config());
  }

  private async load(input: SnapshotInput, config: Config): Promise<PertResult> {
    const snapshot = await loadSnapshot(input.snapshot);
    const graph = buildPertGraph(snapshot.issues, {
      defaultDuration: config.default_duration_hours,
      deadline: input.deadline,
      spacing: config.spacing,
    });
    return {
      graph,
      cycles: graph.cycle_detection.has_cycle ? describeCycles(graph) : [],
      warnings: snapshot.warnings,
    };
  }

  async cycles(input: SnapshotInput): Promise<CycleResult> {
    const { graph, cycles, warnings } = await this.pert(input);
    return {
      has_cycle: graph.cycle_detection.has_cycle,
      cycle_edges: graph.cycle_detection.cycle_edges,
      cycles,
      warnings,
    };
  }

  async order(input: SnapshotInput): Promise<PertNode[]> {
    return nodesInOrder(await this.acyclic(input));
  }

  async critical(input: SnapshotInput): Promise<CriticalResult> {
    const graph = await this.acyclic(input);
    return {
      project_finish: graph.project_finish,
      nodes: criticalPathNodes(graph),
      edges: graph.critical_edges,
    };
  }

  async timeline(input: SnapshotInput): Promise<Timeline> {
    return toTimeline(await this.acyclic(input));
  }

  async focus(input: FocusInput): Promise<FocusView> {
    const config = await this.config();
    const { graph } = await this.load(input, config);
    if (!graph.nodes.has(input.id)) {
      throw new IgraphError("NOT_FOUND", `issue not found: ${input.id}`, 1);
    }
    const focus = extractFocus(graph, {
      id: input.id,
      direction: input.direction ?? config.focus_direction,
      depth: input.depth ?? config.focus_depth,
    });
    return { focus, graph: filterGraph(graph, focus.node_ids) };
  }

  /** Load and build, refusing to continue past a dependency cycle. */
  private async acyclic(input: SnapshotInput): Promise<PertGraph> {
    const { graph, cycles } = await this.pert(input);
    if (graph.cycle_detection.has_cycle) {
      throw new IgraphError("CYCLE_DETECTED", `cycle detected: ${cycles.join("; ")}`, 1, {
        cycle_edges: graph.cycle_detection.cycle_edges,
      });
    }
    return graph;
  }
}
