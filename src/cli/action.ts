import type { Command } from "commander";
import { IgraphError } from "../errors";
import { errEnvelope, formatEnvelope, okEnvelope } from "../output";

export interface GlobalOpts {
  json?: boolean;
}

export interface ActionRender<TValue, TJson> {
  jsonData: (value: TValue) => TJson;
  human: (value: TValue) => void;
}

/**
 * Run one command body and report its value or failure, as a JSON envelope
 * under `--json` and as plain lines otherwise. Failures set the exit code.
 */
export async function runAction<TValue, TJson>(
  command: Command,
  action: (opts: GlobalOpts) => Promise<TValue>,
  render: ActionRender<TValue, TJson>,
): Promise<void> {
  const commandLine = commandPath(command);
  const options = command.optsWithGlobals<GlobalOpts>();
  try {
    const value = await action(options);
    if (options.json) {
      console.log(formatEnvelope(okEnvelope(commandLine, render.jsonData(value))));
      return;
    }
    render.human(value);
  } catch (error) {
    reportError(asIgraphError(error), commandLine, Boolean(options.json));
  }
}

export function reportError(error: IgraphError, commandLine: string, json: boolean): void {
  if (json) {
    console.log(
      formatEnvelope(errEnvelope(commandLine, error.code, error.message, error.details)),
    );
  } else {
    console.error(`${error.code}: ${error.message}`);
    if (error.details) {
      console.error(JSON.stringify(error.details));
    }
  }
  process.exitCode = error.exitCode;
}

export function asIgraphError(error: unknown): IgraphError {
  if (error instanceof IgraphError) {
    return error;
  }
  const message = error instanceof Error ? error.message : "unexpected error";
  return new IgraphError("INTERNAL_ERROR", message, 2);
}

function commandPath(command: Command): string {
  const names: string[] = [];
  let cursor: Command | null = command;
  while (cursor) {
    names.push(cursor.name());
    cursor = cursor.parent ?? null;
  }
  return names.reverse().join(" ");
}
