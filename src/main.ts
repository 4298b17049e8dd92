#!/usr/bin/env node
import { getProjectRoot } from "./app/runtime";
import { GraphService } from "./app/service";
import { asIgraphError, reportError } from "./cli/action";
import { buildProgram } from "./cli/program";

async function main(): Promise<void> {
  const service = new GraphService(getProjectRoot());
  const program = buildProgram({ service });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const isJsonMode = process.argv.includes("--json");
    const commandName = process.argv.slice(2).find((arg) => !arg.startsWith("-")) || "igraph";
    reportError(asIgraphError(error), `igraph ${commandName}`, isJsonMode);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 2;
});
