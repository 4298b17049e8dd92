import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";
import type { IssueRecord } from "../src/types";

const dirs: string[] = [];

export const makeIssue = (id: string, fields: Partial<IssueRecord> = {}): IssueRecord => ({
  id,
  title: `Task ${id}`,
  dependencies: [],
  blocks: [],
  ...fields,
});

export function makeDir(prefix = "issuegraph-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix)).then((dir) => {
    dirs.push(dir);
    return dir;
  });
}

export async function cleanupDirs(): Promise<void> {
  await Promise.all(dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
}

export async function writeSnapshot(
  dir: string,
  value: unknown,
  name = "issues.json",
): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, typeof value === "string" ? value : JSON.stringify(value), "utf8");
  return path;
}

const ANSI_PATTERN = new RegExp(`${String.fromCharCode(27)}\\[[0-9;]*m`, "g");

export function stripAnsi(value: string): string {
  return value.replace(ANSI_PATTERN, "");
}

export interface CapturedOutput {
  stdout: string[];
  stderr: string[];
  restore: () => void;
}

/** Collect console.log / console.error lines with styling removed. */
export function captureConsole(): CapturedOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const log = vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    stdout.push(stripAnsi(args.map(String).join(" ")));
  });
  const error = vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    stderr.push(stripAnsi(args.map(String).join(" ")));
  });
  return {
    stdout,
    stderr,
    restore: () => {
      log.mockRestore();
      error.mockRestore();
    },
  };
}

/** Deterministic pseudo-random generator (mulberry32). */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Random acyclic snapshot: edges only run from a lower to a higher index,
 * declared through either `blocks` or `dependencies`.
 */
export function randomDag(seed: number, size: number, density = 0.3): IssueRecord[] {
  const random = seededRandom(seed);
  const issues: IssueRecord[] = [];
  for (let idx = 0; idx < size; idx += 1) {
    issues.push(
      makeIssue(`n${String(idx).padStart(3, "0")}`, {
        duration_hours: 1 + Math.floor(random() * 8),
      }),
    );
  }
  for (let from = 0; from < size; from += 1) {
    for (let to = from + 1; to < size; to += 1) {
      if (random() >= density) {
        continue;
      }
      const source = issues[from];
      const target = issues[to];
      if (!source || !target) {
        continue;
      }
      if (random() < 0.5) {
        source.blocks.push(target.id);
      } else {
        target.dependencies.push(source.id);
      }
    }
  }
  return issues;
}
