/**
 * `dockspec render <name>`: print the composed Dockerfile without prompting
 * or writing. Credential placeholders are left in place.
 */

import { composeSpecification } from "../engine.js";
import { log } from "../logger.js";
import { configFromFlags, type CommandContext, type LookupFlags } from "./shared.js";

export function runRender(name: string, flags: LookupFlags, context: CommandContext = {}): string {
  const result = composeSpecification(name, configFromFlags(flags, context));

  log.raw(result.text.replace(/\n$/, ""));
  if (result.pendingSecrets.length > 0) {
    log.warn(`Unfilled credential placeholders: ${result.pendingSecrets.join(", ")}`);
  }
  return result.text;
}
