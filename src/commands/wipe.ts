/**
 * `dockspec wipe [path]`: destroy the generated Dockerfile.
 */

import { join } from "node:path";

import { DOCKERFILE_NAME } from "../constants.js";
import { log } from "../logger.js";
import { wipeArtifact, type WipeResult } from "../wipe.js";
import { configFromFlags, type CommandContext } from "./shared.js";

export interface WipeFlags {
  shred?: boolean;
}

export async function runWipe(
  location: string | undefined,
  flags: WipeFlags,
  context: CommandContext = {}
): Promise<WipeResult> {
  const config = configFromFlags({}, context, flags.shred ? "shred" : undefined);
  const target = location ?? join(config.outputDir, DOCKERFILE_NAME);

  const result = await wipeArtifact(target, undefined, {
    method: config.wipeMethod,
    cwd: config.cwd,
    env: context.env ?? process.env,
  });

  if (result.status === "removed") {
    log.success(`Wiped ${result.path} (${result.method})`);
  } else {
    log.dim(`Nothing to wipe: ${result.path} is already absent`);
  }
  return result;
}
