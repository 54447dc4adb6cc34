import { promises as fs } from "fs";
import { ErrorCode, MppError, usageError } from "../core/errors.js";

export type SubjectSource = "file" | "inline";

export interface SubjectList {
  source: SubjectSource;
  subjects: string[];
}

const NUMERIC_PREFIX = /^\s*([+-]?)(\d*)(?:\.(\d*))?/;

interface NumericKey {
  negative: boolean;
  /** Integer digits without leading zeros. */
  int: string;
  /** Fraction digits without trailing zeros. */
  frac: string;
}

// Kept as digit strings: subject IDs routinely exceed Number.MAX_SAFE_INTEGER.
function numericKey(value: string): NumericKey {
  const m = NUMERIC_PREFIX.exec(value);
  const int = (m?.[2] ?? "").replace(/^0+/, "");
  const frac = (m?.[3] ?? "").replace(/0+$/, "");
  return { negative: m?.[1] === "-" && (int.length > 0 || frac.length > 0), int, frac };
}

function compareMagnitude(a: NumericKey, b: NumericKey): number {
  if (a.int.length !== b.int.length) return a.int.length < b.int.length ? -1 : 1;
  if (a.int !== b.int) return a.int < b.int ? -1 : 1;
  if (a.frac !== b.frac) return a.frac < b.frac ? -1 : 1;
  return 0;
}

function compareNumeric(a: NumericKey, b: NumericKey): number {
  if (a.negative !== b.negative) return a.negative ? -1 : 1;
  const diff = compareMagnitude(a, b);
  return a.negative ? -diff : diff;
}

/** `sort -n` ordering: leading number first (none counts as 0), then plain string order. */
export function compareSubjectIds(a: string, b: string): number {
  const diff = compareNumeric(numericKey(a), numericKey(b));
  if (diff !== 0) return diff;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function sortSubjects(subjects: readonly string[]): string[] {
  return [...subjects].sort(compareSubjectIds);
}

export function parseSubjectLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}

export function parseInlineSubjects(list: string): string[] {
  return list.split(/\s+/).filter((t) => t.length > 0);
}

function assertSubjectId(id: string): void {
  if (id === "." || id === ".." || id.includes("/") || id.includes("\\")) {
    throw new MppError(ErrorCode.SubjectResolution, `invalid subject id: ${id}`);
  }
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/** A path to a regular file is read line by line; anything else is taken as an inline list. */
export async function resolveSubjects(fileOrList: string): Promise<SubjectList> {
  let source: SubjectSource;
  let raw: string[];

  if (await isRegularFile(fileOrList)) {
    source = "file";
    raw = parseSubjectLines(await fs.readFile(fileOrList, "utf8"));
  } else {
    source = "inline";
    raw = parseInlineSubjects(fileOrList);
  }

  for (const id of raw) assertSubjectId(id);
  return { source, subjects: sortSubjects(raw) };
}

export function buildArraySpec(count: number): string {
  if (!Number.isInteger(count) || count < 1) {
    throw usageError(`job array needs at least one subject (got ${count})`);
  }
  return Array.from({ length: count }, (_, i) => String(i + 1)).join(",");
}

export function subjectForTask(subjects: readonly string[], taskIndex: number): string {
  if (!Number.isInteger(taskIndex) || taskIndex < 1 || taskIndex > subjects.length) {
    throw new MppError(
      ErrorCode.SubjectResolution,
      `array task index ${taskIndex} is outside the subject list (1..${subjects.length})`
    );
  }
  const subject = subjects[taskIndex - 1];
  if (!subject) {
    throw new MppError(ErrorCode.SubjectResolution, `no subject at array task index ${taskIndex}`);
  }
  return subject;
}
