/**
 * Specification store: single-name lookups over a search path.
 *
 * Read-only filesystem access. A store instance memoizes what it loaded,
 * and one is created per build, so nothing is shared across runs.
 */

import { readdirSync, readFileSync, statSync } from "node:fs";
import { join } from "node:path";

import { SPEC_FILE_SUFFIX } from "./constants.js";
import { errnoCode, SpecificationNotFoundError } from "./errors.js";
import { log } from "./logger.js";
import type { SearchPath } from "./search-path.js";
import { parseSpecification } from "./spec-parser.js";
import type { Specification, SpecSummary } from "./types/specification.js";
import { validateSpecName } from "./validation.js";

/**
 * Read a bundle file, or null when it is absent or unreadable.
 */
function readBundle(file: string): string | null {
  try {
    if (!statSync(file).isFile()) {
      return null;
    }
    return readFileSync(file, "utf-8");
  } catch (error: unknown) {
    const code = errnoCode(error);
    if (code !== "ENOENT" && code !== "ENOTDIR") {
      log.debug(`Skipping ${file}: ${code ?? String(error)}`);
    }
    return null;
  }
}

function listBundleNames(dir: string): string[] {
  let entries: string[];
  try {
    entries = readdirSync(dir);
  } catch (error: unknown) {
    log.debug(`Skipping search directory ${dir}: ${errnoCode(error) ?? String(error)}`);
    return [];
  }
  return entries
    .filter((entry) => entry.endsWith(SPEC_FILE_SUFFIX) && entry.length > SPEC_FILE_SUFFIX.length)
    .map((entry) => entry.slice(0, -SPEC_FILE_SUFFIX.length))
    .sort();
}

export class SpecStore {
  private readonly loaded = new Map<string, Specification>();

  constructor(readonly searchPath: SearchPath) {}

  /**
   * Find a specification by name; the first search-path directory holding
   * `<name>.docker_spec` wins.
   *
   * @param requiredBy - Including specification, reported when the lookup fails.
   * @throws SpecificationNotFoundError after exhausting the search path.
   */
  find(name: string, requiredBy?: string): Specification {
    const cached = this.loaded.get(name);
    if (cached) {return cached;}

    validateSpecName(name);
    const fileName = `${name}${SPEC_FILE_SUFFIX}`;

    for (const dir of this.searchPath) {
      const file = join(dir, fileName);
      const content = readBundle(file);
      if (content === null) {continue;}

      log.debug(`Found specification '${name}' in ${dir}`);
      const spec = parseSpecification({ name, location: dir, file, content });
      this.loaded.set(name, spec);
      return spec;
    }

    throw new SpecificationNotFoundError(name, this.searchPath, requiredBy);
  }

  /**
   * Every bundle visible on the search path, in precedence order.
   */
  list(): SpecSummary[] {
    const seen = new Set<string>();
    const summaries: SpecSummary[] = [];

    for (const dir of this.searchPath) {
      for (const name of listBundleNames(dir)) {
        const file = join(dir, `${name}${SPEC_FILE_SUFFIX}`);
        const content = readBundle(file);
        if (content === null) {continue;}

        let description: string | undefined;
        try {
          description = parseSpecification({ name, location: dir, file, content }).description;
        } catch (error: unknown) {
          log.warn(error instanceof Error ? error.message : String(error));
        }

        summaries.push({
          name,
          location: dir,
          ...(description !== undefined ? { description } : {}),
          shadowed: seen.has(name),
        });
        seen.add(name);
      }
    }
    return summaries;
  }
}
