import { Command } from "commander";
import { parseDepth, parseFocusDirection, parseHours } from "../app/runtime";
import type { GraphService, SnapshotInput } from "../app/service";
import { serializeGraph } from "../domain/pert";
import { IgraphError } from "../errors";
import type { ConfigOverrides } from "../store/config";
import { runAction } from "./action";
import {
  printCritical,
  printCycleResult,
  printFocus,
  printOrder,
  printPertGraph,
  printTimeline,
} from "./render";

export interface RuntimeDeps {
  service: GraphService;
}

interface InitOptions {
  defaultDuration?: string;
  focusDirection?: string;
  focusDepth?: string;
}

interface DeadlineOptions {
  deadline?: string;
}

export function buildProgram(deps: RuntimeDeps): Command {
  const program = new Command();
  program
    .name("igraph")
    .description("Dependency graph, critical path and layout for issue snapshots")
    .option("--json", "emit JSON envelope");

  program
    .command("init")
    .description("Initialize .issuegraph config")
    .option("--default-duration <hours>", "hours for issues without an estimate")
    .option("--focus-direction <dir>", "upstream|downstream|both")
    .option("--focus-depth <n>", "default focus depth, 1..10")
    .action(async function action(this: Command, options: InitOptions) {
      await runAction(this, async () => deps.service.init(initOverrides(options)), {
        jsonData: (data) => data,
        human: (data) => {
          if (data.files.length === 0) {
            console.log("config already present");
          }
          for (const file of data.files) {
            console.log(`created ${file}`);
          }
          console.log(
            `default_duration=${data.config.default_duration_hours}h focus=${data.config.focus_direction} depth=${data.config.focus_depth}`,
          );
        },
      });
    });

  program
    .command("pert")
    .argument("<snapshot>", "issue snapshot JSON file")
    .option("--deadline <hours>", "required completion time in hours")
    .description("Show PERT schedule, critical path and layout")
    .action(async function action(this: Command, snapshot: string, options: DeadlineOptions) {
      await runAction(this, async () => deps.service.pert(snapshotInput(snapshot, options)), {
        jsonData: (data) => ({
          graph: serializeGraph(data.graph),
          cycles: data.cycles,
          warnings: data.warnings,
        }),
        human: (data) => printPertGraph(data),
      });
    });

  program
    .command("cycles")
    .argument("<snapshot>", "issue snapshot JSON file")
    .description("Report dependency cycles")
    .action(async function action(this: Command, snapshot: string) {
      await runAction(this, async () => deps.service.cycles({ snapshot }), {
        jsonData: (data) => ({
          has_cycle: data.has_cycle,
          cycle_edges: data.cycle_edges.map((edge) => [edge.from, edge.to]),
          cycles: data.cycles,
          warnings: data.warnings,
        }),
        human: (data) => printCycleResult(data),
      });
    });

  program
    .command("order")
    .argument("<snapshot>", "issue snapshot JSON file")
    .description("List issues in dependency order")
    .action(async function action(this: Command, snapshot: string) {
      await runAction(this, async () => deps.service.order({ snapshot }), {
        jsonData: (nodes) => ({ order: nodes.map((node) => node.id) }),
        human: (nodes) => printOrder(nodes),
      });
    });

  program
    .command("critical")
    .argument("<snapshot>", "issue snapshot JSON file")
    .option("--deadline <hours>", "required completion time in hours")
    .description("Show the critical path")
    .action(async function action(this: Command, snapshot: string, options: DeadlineOptions) {
      await runAction(this, async () => deps.service.critical(snapshotInput(snapshot, options)), {
        jsonData: (data) => ({
          project_finish: data.project_finish,
          critical_path: data.nodes.map((node) => node.id),
          critical_edges: data.edges,
        }),
        human: (data) => printCritical(data),
      });
    });

  program
    .command("focus")
    .argument("<snapshot>", "issue snapshot JSON file")
    .argument("<id>", "issue to focus on")
    .option("--direction <dir>", "upstream|downstream|both")
    .option("--depth <n>", "levels to include, 1..10")
    .description("Show the neighbourhood of one issue")
    .action(async function action(
      this: Command,
      snapshot: string,
      id: string,
      options: { direction?: string; depth?: string },
    ) {
      await runAction(
        this,
        async () =>
          deps.service.focus({
            snapshot,
            id,
            direction: options.direction ? parseFocusDirection(options.direction) : undefined,
            depth: options.depth ? parseDepth(options.depth) : undefined,
          }),
        {
          jsonData: (data) => ({ focus: data.focus, graph: serializeGraph(data.graph) }),
          human: (data) => printFocus(data),
        },
      );
    });

  program
    .command("timeline")
    .argument("<snapshot>", "issue snapshot JSON file")
    .option("--width <columns>", "render width")
    .description("Render a Gantt timeline from the schedule")
    .action(async function action(this: Command, snapshot: string, options: { width?: string }) {
      await runAction(
        this,
        async () => {
          const width = options.width ? parseWidth(options.width) : undefined;
          return { timeline: await deps.service.timeline({ snapshot }), width };
        },
        {
          jsonData: (data) => data.timeline,
          human: (data) => printTimeline(data.timeline, data.width),
        },
      );
    });

  return program;
}

function snapshotInput(snapshot: string, options: DeadlineOptions): SnapshotInput {
  return {
    snapshot,
    deadline: options.deadline ? parseHours(options.deadline, "deadline") : undefined,
  };
}

function initOverrides(options: InitOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.defaultDuration) {
    overrides.default_duration_hours = parseHours(options.defaultDuration, "default duration");
  }
  if (options.focusDirection) {
    overrides.focus_direction = parseFocusDirection(options.focusDirection);
  }
  if (options.focusDepth) {
    overrides.focus_depth = parseDepth(options.focusDepth);
  }
  return overrides;
}

function parseWidth(raw: string): number {
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new IgraphError("VALIDATION_ERROR", "width must be a positive integer", 1);
  }
  return value;
}
