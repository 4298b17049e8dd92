import { afterEach, describe, expect, it } from "vitest";
import { join } from "node:path";
import { loadSnapshot, parseSnapshot, toIssueRecord } from "../src/app/snapshot";
import { IgraphError } from "../src/errors";
import { cleanupDirs, makeDir, writeSnapshot } from "./helpers";

afterEach(async () => {
  await cleanupDirs();
});

async function expectCode(promise: Promise<unknown>, code: string): Promise<IgraphError> {
  let caught: unknown;
  try {
    await promise;
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(IgraphError);
  if (!(caught instanceof IgraphError)) {
    throw new Error("expected IgraphError");
  }
  expect(caught.code).toBe(code);
  return caught;
}

describe("loadSnapshot", () => {
  it("reads a plain array of issues", async () => {
    const dir = await makeDir();
    const path = await writeSnapshot(dir, [
      { id: "A", title: "Design", duration_hours: 4, blocks: ["B"] },
      { id: "B", title: "Build", dependencies: ["A"] },
    ]);

    expect(await loadSnapshot(path)).toEqual({
      path,
      issues: [
        { id: "A", title: "Design", duration_hours: 4, dependencies: [], blocks: ["B"] },
        { id: "B", title: "Build", dependencies: ["A"], blocks: [] },
      ],
      warnings: [],
    });
  });

  it("reads an object with an issues array", async () => {
    const dir = await makeDir();
    const path = await writeSnapshot(dir, { exported_at: "2026-01-01", issues: [{ id: "A" }] });

    const snapshot = await loadSnapshot(path);
    expect(snapshot.issues).toEqual([{ id: "A", title: "A", dependencies: [], blocks: [] }]);
  });

  it("fails with SNAPSHOT_NOT_FOUND for a missing file", async () => {
    const dir = await makeDir();
    const path = join(dir, "absent.json");

    const error = await expectCode(loadSnapshot(path), "SNAPSHOT_NOT_FOUND");
    expect(error.message).toBe(`snapshot not found: ${path}`);
    expect(error.exitCode).toBe(1);
  });

  it("fails with SNAPSHOT_INVALID for malformed JSON", async () => {
    const dir = await makeDir();
    const path = await writeSnapshot(dir, "{ not json");

    const error = await expectCode(loadSnapshot(path), "SNAPSHOT_INVALID");
    expect(error.message).toBe("snapshot JSON is malformed");
  });

  it("fails with SNAPSHOT_INVALID for a directory", async () => {
    const dir = await makeDir();

    await expectCode(loadSnapshot(dir), "SNAPSHOT_INVALID");
  });
});

describe("parseSnapshot", () => {
  it("rejects values without an issues array", () => {
    expect(() => parseSnapshot({ items: [] })).toThrow(
      "snapshot must be an array of issues or an object with an issues array",
    );
    expect(() => parseSnapshot("issues")).toThrow(IgraphError);
  });

  it("skips entries without an id and reports where they were", () => {
    const result = parseSnapshot([{ id: "A" }, { title: "orphan" }, 42, { id: "" }, { id: "B" }]);

    expect(result.issues.map((issue) => issue.id)).toEqual(["A", "B"]);
    expect(result.warnings).toEqual([
      "issues[1] skipped: missing id",
      "issues[2] skipped: missing id",
      "issues[3] skipped: missing id",
    ]);
  });
});

describe("toIssueRecord", () => {
  it("merges id list aliases and drops junk entries", () => {
    expect(
      toIssueRecord({
        id: "C",
        dependencies: ["A", 7, ""],
        dependency_ids: ["B", "A"],
        blocks: "D",
        blocks_ids: ["E"],
      }),
    ).toEqual({ id: "C", title: "C", dependencies: ["A", "B"], blocks: ["E"] });
  });

  it("falls back to estimate_hours for the duration", () => {
    expect(toIssueRecord({ id: "A", estimate_hours: 6 })?.duration_hours).toBe(6);
    expect(toIssueRecord({ id: "A", duration_hours: 2, estimate_hours: 6 })?.duration_hours).toBe(
      2,
    );
    expect(toIssueRecord({ id: "A", duration_hours: "2" })?.duration_hours).toBeUndefined();
  });

  it("converts structured estimates in days and weeks to hours", () => {
    const hoursOf = (estimate: unknown) => toIssueRecord({ id: "A", estimate })?.duration_hours;

    expect(hoursOf({ hours: 5 })).toBe(5);
    expect(hoursOf({ days: 3 })).toBe(24);
    expect(hoursOf({ weeks: 2 })).toBe(80);
    expect(hoursOf({ days: 0, weeks: 1 })).toBe(40);
    expect(hoursOf({ days: "3" })).toBeUndefined();
    expect(hoursOf(16)).toBeUndefined();
    expect(toIssueRecord({ id: "A", estimate_hours: 6, estimate: { days: 1 } })?.duration_hours).toBe(
      6,
    );
  });

  it("keeps tracker fields that are valid and ignores the rest", () => {
    expect(
      toIssueRecord({
        id: "A",
        title: "Ship",
        status: "in_progress",
        priority: 1,
        issue_type: "feature",
        assignee: "dev",
        labels: ["api", "api", "ui"],
        created_at: "2026-01-02T00:00:00Z",
        updated_at: "2026-01-03T00:00:00Z",
      }),
    ).toEqual({
      id: "A",
      title: "Ship",
      dependencies: [],
      blocks: [],
      status: "in_progress",
      priority: 1,
      issue_type: "feature",
      assignee: "dev",
      labels: ["api", "ui"],
      created_at: "2026-01-02T00:00:00Z",
      updated_at: "2026-01-03T00:00:00Z",
    });

    expect(
      toIssueRecord({ id: "A", status: "done", priority: 9, issue_type: "story", assignee: "" }),
    ).toEqual({ id: "A", title: "A", dependencies: [], blocks: [] });
  });
});
