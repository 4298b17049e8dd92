import { join } from "node:path";

export const PROJECT_DIR = ".issuegraph";

export interface ProjectPaths {
  projectDir: string;
  configFile: string;
}

export function getPaths(projectRoot: string): ProjectPaths {
  const projectDir = join(projectRoot, PROJECT_DIR);
  return {
    projectDir,
    configFile: join(projectDir, "config.json"),
  };
}
