/**
 * `dockspec list`: specifications visible on the search path.
 */

import { listSpecifications } from "../engine.js";
import { log, style } from "../logger.js";
import type { SpecSummary } from "../types/specification.js";
import { configFromFlags, type CommandContext, type LookupFlags } from "./shared.js";

export function runList(flags: LookupFlags, context: CommandContext = {}): SpecSummary[] {
  const specs = listSpecifications(configFromFlags(flags, context));

  if (specs.length === 0) {
    log.yellow("No specifications found on the search path.");
    return specs;
  }

  log.bold("Available specifications");
  for (const spec of specs) {
    const name = spec.shadowed ? style.dim(`${spec.name} (shadowed)`) : style.cyan(spec.name);
    log.raw(`  ${name}  ${style.dim(spec.location)}`);
    if (spec.description) {
      log.info(`    ${spec.description}`);
    }
  }
  return specs;
}
