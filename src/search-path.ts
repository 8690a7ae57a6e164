/**
 * Search path resolution for specification directories.
 *
 * Precedence (first match wins during lookup):
 *   1. Caller-supplied directories (--spec-dir, config file specPath)
 *   2. DOCKSPEC_PATH entries, left to right
 *   3. Current working directory
 *   4. Bundled specifications directory
 *
 * Directories are not checked for existence here; the store skips
 * unreadable ones during lookup.
 */

import { resolve } from "node:path";

/** Ordered, duplicate-free list of absolute directories. */
export type SearchPath = readonly string[];

export interface SearchPathInput {
  /** Raw colon-separated value of DOCKSPEC_PATH (may be absent or empty). */
  envValue?: string;
  cwd: string;
  bundledDir: string;
  /** Directories searched before the environment entries. */
  extraDirs?: readonly string[];
}

/**
 * Split a colon-separated directory list, dropping empty entries.
 */
export function splitPathList(value: string | undefined): string[] {
  if (!value) {return [];}
  return value.split(":").filter((entry) => entry.trim() !== "");
}

export function resolveSearchPath(input: SearchPathInput): SearchPath {
  const candidates = [
    ...(input.extraDirs ?? []),
    ...splitPathList(input.envValue),
    input.cwd,
    input.bundledDir,
  ];

  const seen = new Set<string>();
  const result: string[] = [];
  for (const dir of candidates) {
    const absolute = resolve(input.cwd, dir);
    if (!seen.has(absolute)) {
      seen.add(absolute);
      result.push(absolute);
    }
  }
  return result;
}
