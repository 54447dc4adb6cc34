import type { Dirent } from "fs";
import { promises as fs } from "fs";
import path from "path";
import { isNodeError } from "../core/errors.js";

export const INPUT_DELIMITER = "@";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** `<subject>_-_<class>_-_<domain>` with at most one run-suffix character, e.g. `..._-_T1w_MPR1.nii.gz`. */
export function domainImagePattern(subjectId: string, className: string, domain: string): RegExp {
  return new RegExp(`^${escapeRegExp(subjectId)}_-_${escapeRegExp(className)}_-_${escapeRegExp(domain)}.?\\.nii\\.gz$`);
}

async function walkFiles(dir: string, out: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isNodeError(err, "ENOENT")) return;
    throw err;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) await walkFiles(full, out);
    else if (e.isFile()) out.push(full);
  }
}

/** Matching images under `searchRoot`, in name-sorted walk order. A missing root yields no images. */
export async function findDomainImages(input: {
  searchRoot: string;
  subjectId: string;
  className: string;
  domain: string;
}): Promise<string[]> {
  const pattern = domainImagePattern(input.subjectId, input.className, input.domain);
  const files: string[] = [];
  await walkFiles(input.searchRoot, files);
  return files.filter((f) => pattern.test(path.basename(f)));
}

export function joinInputImages(paths: readonly string[]): string {
  return paths.join(INPUT_DELIMITER);
}
