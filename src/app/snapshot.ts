import { readFile } from "node:fs/promises";
import { normalizeIdList } from "../domain/edges";
import { IgraphError } from "../errors";
import type { IssueRecord, IssueStatus, IssueType } from "../types";

export interface IssueSnapshot {
  path: string;
  issues: IssueRecord[];
  warnings: string[];
}

const HOURS_PER_DAY = 8;
const HOURS_PER_WEEK = 40;

const STATUSES: readonly IssueStatus[] = ["open", "in_progress", "blocked", "closed"];
const ISSUE_TYPES: readonly IssueType[] = ["bug", "feature", "task", "epic", "chore"];

/**
 * Read an issue snapshot exported by the tracker: either a JSON array of
 * issues or an object with an `issues` array.
 */
export async function loadSnapshot(path: string): Promise<IssueSnapshot> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === "ENOENT") {
      throw new IgraphError("SNAPSHOT_NOT_FOUND", `snapshot not found: ${path}`, 1);
    }
    throw new IgraphError("SNAPSHOT_INVALID", `failed reading snapshot: ${path}`, 1, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new IgraphError("SNAPSHOT_INVALID", "snapshot JSON is malformed", 1, error);
  }

  const { issues, warnings } = parseSnapshot(parsed);
  return { path, issues, warnings };
}

export function parseSnapshot(value: unknown): { issues: IssueRecord[]; warnings: string[] } {
  const entries = Array.isArray(value) ? value : isRecord(value) ? value.issues : undefined;
  if (!Array.isArray(entries)) {
    throw new IgraphError(
      "SNAPSHOT_INVALID",
      "snapshot must be an array of issues or an object with an issues array",
      1,
    );
  }

  const issues: IssueRecord[] = [];
  const warnings: string[] = [];
  entries.forEach((entry: unknown, idx) => {
    const issue = toIssueRecord(entry);
    if (issue) {
      issues.push(issue);
    } else {
      warnings.push(`issues[${idx}] skipped: missing id`);
    }
  });
  return { issues, warnings };
}

export function toIssueRecord(value: unknown): IssueRecord | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const id = value.id;
  if (typeof id !== "string" || id.length === 0) {
    return undefined;
  }

  const issue: IssueRecord = {
    id,
    title: typeof value.title === "string" ? value.title : id,
    dependencies: mergeIdLists(value.dependencies, value.dependency_ids),
    blocks: mergeIdLists(value.blocks, value.blocks_ids),
  };

  const duration =
    asFiniteNumber(value.duration_hours) ??
    asFiniteNumber(value.estimate_hours) ??
    estimateHours(value.estimate);
  if (duration !== undefined) {
    issue.duration_hours = duration;
  }
  const status = STATUSES.find((entry) => entry === value.status);
  if (status) {
    issue.status = status;
  }
  const priority = value.priority;
  if (priority === 0 || priority === 1 || priority === 2 || priority === 3 || priority === 4) {
    issue.priority = priority;
  }
  const issueType = ISSUE_TYPES.find((entry) => entry === value.issue_type);
  if (issueType) {
    issue.issue_type = issueType;
  }
  if (typeof value.assignee === "string" && value.assignee.length > 0) {
    issue.assignee = value.assignee;
  }
  if (Array.isArray(value.labels)) {
    issue.labels = normalizeIdList(value.labels);
  }
  if (typeof value.created_at === "string") {
    issue.created_at = value.created_at;
  }
  if (typeof value.updated_at === "string") {
    issue.updated_at = value.updated_at;
  }
  return issue;
}

function mergeIdLists(primary: unknown, alias: unknown): string[] {
  return normalizeIdList([...normalizeIdList(primary), ...normalizeIdList(alias)]);
}

/** `{ hours | days | weeks }`, counting 8-hour days and 40-hour weeks. */
function estimateHours(value: unknown): number | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const hours = asPositiveNumber(value.hours);
  if (hours !== undefined) {
    return hours;
  }
  const days = asPositiveNumber(value.days);
  if (days !== undefined) {
    return days * HOURS_PER_DAY;
  }
  const weeks = asPositiveNumber(value.weeks);
  return weeks === undefined ? undefined : weeks * HOURS_PER_WEEK;
}

function asPositiveNumber(value: unknown): number | undefined {
  const number = asFiniteNumber(value);
  return number !== undefined && number > 0 ? number : undefined;
}

function asFiniteNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
