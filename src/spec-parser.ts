/**
 * Parser for `.docker_spec` bundle files.
 *
 * Bundle format:
 *   #@ description <text>
 *   #@ include <name> [<name> ...]     (alias: #@ parent)
 *   #@ default <KEY>=<value>
 *   <any other line is Dockerfile text, kept verbatim>
 *
 * Directive lines split the text into fragments. Runs made only of blank
 * lines are dropped.
 */

import { DIRECTIVE_MARKER } from "./constants.js";
import { InvalidSpecificationError } from "./errors.js";
import { scanPlaceholders } from "./placeholders.js";
import type { Specification } from "./types/specification.js";
import { isSecretKey, isValidPlaceholderKey, validateSpecName } from "./validation.js";

export interface BundleSource {
  name: string;
  location: string;
  file: string;
  content: string;
}

const DEFAULT_ASSIGNMENT = /^([^=\s]+)=(.*)$/;

function splitLines(content: string): string[] {
  const lines = content.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  // A single end-of-file newline does not start another line
  if (content.endsWith("\n")) {
    lines.pop();
  }
  return lines;
}

function isDirective(line: string): boolean {
  return line.trimStart().startsWith(DIRECTIVE_MARKER);
}

/**
 * Parse a bundle's text into an immutable Specification.
 *
 * @throws InvalidSpecificationError for malformed or unknown directives.
 */
export function parseSpecification(source: BundleSource): Specification {
  const { file } = source;
  const fragments: string[] = [];
  const includes: string[] = [];
  const defaults = new Map<string, string>();
  let description: string | undefined;
  let current: string[] = [];

  const closeFragment = (): void => {
    if (current.some((line) => line.trim() !== "")) {
      fragments.push(current.join("\n"));
    }
    current = [];
  };

  splitLines(source.content).forEach((line, idx) => {
    const lineNo = idx + 1;
    if (!isDirective(line)) {
      current.push(line);
      return;
    }

    closeFragment();
    const body = line.trimStart().slice(DIRECTIVE_MARKER.length).trim();
    const spaceIdx = body.search(/\s/);
    const keyword = (spaceIdx === -1 ? body : body.slice(0, spaceIdx)).toLowerCase();
    const args = spaceIdx === -1 ? "" : body.slice(spaceIdx + 1).trim();

    switch (keyword) {
      case "include":
      case "parent": {
        const names = args.split(/\s+/).filter(Boolean);
        if (names.length === 0) {
          throw new InvalidSpecificationError(file, lineNo, `'${keyword}' needs at least one specification name`);
        }
        for (const name of names) {
          try {
            validateSpecName(name);
          } catch (error: unknown) {
            const msg = error instanceof Error ? error.message : String(error);
            throw new InvalidSpecificationError(file, lineNo, msg);
          }
          if (!includes.includes(name)) {
            includes.push(name);
          }
        }
        break;
      }
      case "default": {
        const match = DEFAULT_ASSIGNMENT.exec(args);
        const key = match?.[1];
        const value = match?.[2];
        if (key === undefined || value === undefined || !isValidPlaceholderKey(key)) {
          throw new InvalidSpecificationError(file, lineNo, `expected 'default KEY=value', got '${args}'`);
        }
        if (isSecretKey(key)) {
          throw new InvalidSpecificationError(file, lineNo, `credential placeholder '${key}' cannot have a default`);
        }
        defaults.set(key, value);
        break;
      }
      case "description":
        description = args;
        break;
      case "":
        throw new InvalidSpecificationError(file, lineNo, "empty directive");
      default:
        throw new InvalidSpecificationError(file, lineNo, `unknown directive '${keyword}'`);
    }
  });
  closeFragment();

  const { plain, secret } = scanPlaceholders(fragments);

  return {
    name: source.name,
    location: source.location,
    file,
    ...(description !== undefined ? { description } : {}),
    fragments,
    includes,
    defaults,
    placeholders: { plain: new Set(plain), secret: new Set(secret) },
  };
}
