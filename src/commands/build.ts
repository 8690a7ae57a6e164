/**
 * `dockspec build <name>`: compose, prompt for credentials, write Dockerfile.
 */

import { readFileSync } from "node:fs";

import { buildArtifact } from "../engine.js";
import type { CredentialSource } from "../interfaces/credential-source.js";
import { log } from "../logger.js";
import { redactText } from "../manifest.js";
import { configFromFlags, type CommandContext, type LookupFlags } from "./shared.js";

export interface BuildFlags extends LookupFlags {
  /** Print the written Dockerfile with credentials masked */
  show?: boolean;
}

export interface BuildSummary {
  path: string;
  specifications: string[];
  /** Number of distinct credentials written into the file */
  credentials: number;
  /** Lines of the file holding credentials */
  credentialLines: number[];
}

export async function runBuild(
  name: string,
  flags: BuildFlags,
  context: CommandContext = {},
  credentials?: CredentialSource
): Promise<BuildSummary> {
  const config = configFromFlags(flags, context);
  const result = await buildArtifact(name, config, credentials);

  try {
    const credentialLines = [...new Set(result.manifest.allOccurrences().map((o) => o.line))];

    log.success(`Wrote ${result.path}`);
    log.dim(`Composed: ${result.specifications.join(" -> ")}`);

    if (flags.show) {
      const written = readFileSync(result.path, "utf-8");
      log.raw(redactText(written, result.manifest).replace(/\n$/, ""));
    }

    if (result.manifest.size > 0) {
      log.warn(
        `${result.path} contains ${result.manifest.size} credential(s) on line(s) ${credentialLines.join(", ")}.`
      );
      log.warn("Run `dockspec wipe` as soon as the image is built.");
    }

    return {
      path: result.path,
      specifications: result.specifications,
      credentials: result.manifest.size,
      credentialLines,
    };
  } finally {
    // This process does not wipe; nothing needs the values any longer
    result.manifest.clear();
  }
}
