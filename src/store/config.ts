import { mkdir, open, readFile, rename, unlink } from "node:fs/promises";

import { IgraphError } from "../errors";
import { type Config, type FocusDirection, SCHEMA_VERSION } from "../types";
import { getPaths } from "./paths";

export const DEFAULT_CONFIG: Config = {
  schema_version: SCHEMA_VERSION,
  default_duration_hours: 24,
  focus_depth: 1,
  focus_direction: "both",
  spacing: { x: 4, y: 3 },
};

function isFocusDirection(value: unknown): value is FocusDirection {
  return value === "upstream" || value === "downstream" || value === "both";
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isConfig(value: unknown): value is Config {
  if (!value || typeof value !== "object") {
    return false;
  }

  const config = value as Partial<Config>;
  return (
    typeof config.schema_version === "number" &&
    typeof config.default_duration_hours === "number" &&
    Number.isFinite(config.default_duration_hours) &&
    config.default_duration_hours > 0 &&
    isPositiveInteger(config.focus_depth) &&
    config.focus_depth <= 10 &&
    isFocusDirection(config.focus_direction) &&
    typeof config.spacing === "object" &&
    config.spacing !== null &&
    isPositiveInteger(config.spacing.x) &&
    isPositiveInteger(config.spacing.y)
  );
}

export type ConfigOverrides = Partial<
  Pick<Config, "default_duration_hours" | "focus_depth" | "focus_direction" | "spacing">
>;

export interface InitConfigResult {
  created: boolean;
  config: Config;
}

/**
 * Create the project config from the defaults plus `overrides`. An existing
 * file is never replaced; it is read back, validated and reported as is.
 */
export async function initConfig(
  projectRoot: string,
  overrides: ConfigOverrides = {},
): Promise<InitConfigResult> {
  const paths = getPaths(projectRoot);
  await mkdir(paths.projectDir, { recursive: true });

  try {
    await readFile(paths.configFile, "utf8");
    return { created: false, config: await readConfig(projectRoot) };
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code !== "ENOENT") {
      throw error instanceof IgraphError
        ? error
        : new IgraphError("CONFIG_READ_FAILED", "Failed checking config", 2, error);
    }
  }

  const config: Config = {
    ...DEFAULT_CONFIG,
    ...overrides,
    spacing: { ...(overrides.spacing ?? DEFAULT_CONFIG.spacing) },
  };
  if (!isConfig(config)) {
    throw new IgraphError("VALIDATION_ERROR", "Config overrides are out of range", 1, overrides);
  }
  await writeConfigFile(paths.configFile, config);
  return { created: true, config };
}

async function writeConfigFile(path: string, config: Config): Promise<void> {
  const temp = `${path}.tmp-${process.pid}-${Date.now()}`;
  const payload = `${JSON.stringify(config, null, 2)}\n`;

  try {
    const handle = await open(temp, "w");
    try {
      await handle.writeFile(payload, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(temp, path);
  } catch (error) {
    try {
      await unlink(temp);
    } catch {
      // temp file may never have been created
    }
    throw new IgraphError("CONFIG_WRITE_FAILED", "Failed writing config", 2, error);
  }
}

/** Read the project config; a missing file means defaults. */
export async function readConfig(projectRoot: string): Promise<Config> {
  const paths = getPaths(projectRoot);

  let raw: string;
  try {
    raw = await readFile(paths.configFile, "utf8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === "ENOENT") {
      return { ...DEFAULT_CONFIG, spacing: { ...DEFAULT_CONFIG.spacing } };
    }
    throw new IgraphError("CONFIG_READ_FAILED", "Failed reading config", 2, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new IgraphError("CONFIG_INVALID", "Config JSON is malformed", 2, error);
  }

  if (!isConfig(parsed)) {
    throw new IgraphError("CONFIG_INVALID", "Config shape is invalid", 2, parsed);
  }

  return parsed;
}
