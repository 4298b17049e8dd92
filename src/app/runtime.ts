import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { IgraphError } from "../errors";
import { PROJECT_DIR } from "../store/paths";
import type { Config, FocusDirection } from "../types";

export const DURATION_ENV = "ISSUEGRAPH_DEFAULT_DURATION";

/** Walk up from `start` to find the nearest directory containing `.issuegraph/`. */
export function findProjectRoot(start: string = process.cwd()): string | null {
  let dir = start;
  for (;;) {
    if (existsSync(join(dir, PROJECT_DIR))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Return the project root containing `.issuegraph/`.
 * Falls back to cwd when none is found (needed for `igraph init`).
 */
export function getProjectRoot(): string {
  return findProjectRoot() ?? process.cwd();
}

/** Apply environment overrides on top of the file config. */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const raw = env[DURATION_ENV]?.trim();
  if (!raw) {
    return config;
  }
  return { ...config, default_duration_hours: parseHours(raw, DURATION_ENV) };
}

export function parseHours(raw: string, label = "hours"): number {
  const value = Number(raw);
  if (raw.trim().length === 0 || !Number.isFinite(value) || value <= 0) {
    throw new IgraphError("VALIDATION_ERROR", `${label} must be a positive number`, 1);
  }
  return value;
}

export function parseFocusDirection(raw: string): FocusDirection {
  if (raw === "upstream" || raw === "downstream" || raw === "both") {
    return raw;
  }
  throw new IgraphError("VALIDATION_ERROR", "direction must be upstream|downstream|both", 1);
}

/** Depth must be an integer; range clamping happens in the focus extractor. */
export function parseDepth(raw: string): number {
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || String(value) !== raw.trim()) {
    throw new IgraphError("VALIDATION_ERROR", "depth must be an integer", 1);
  }
  return value;
}
