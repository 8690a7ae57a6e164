/**
 * `dockspec show <name>`: where a specification lives and what it needs.
 */

import { describeSpecification, type SpecificationDetails } from "../engine.js";
import { log, style } from "../logger.js";
import { configFromFlags, type CommandContext, type LookupFlags } from "./shared.js";

export function runShow(name: string, flags: LookupFlags, context: CommandContext = {}): SpecificationDetails {
  const config = configFromFlags(flags, context);
  const details = describeSpecification(name, config);
  const { spec } = details;

  log.raw(style.cyanBold(spec.name));
  if (spec.description) {
    log.info(`  ${spec.description}`);
  }
  log.info(`  file:      ${spec.file}`);
  log.info(`  includes:  ${spec.includes.length > 0 ? spec.includes.join(", ") : "-"}`);
  log.info(`  order:     ${details.order.join(" -> ")}`);

  const plain = [...spec.placeholders.plain].map((key) => {
    const value = config.variables.get(key) ?? spec.defaults.get(key);
    return value === undefined ? `${key} ${style.yellow("(unset)")}` : `${key}=${value}`;
  });
  log.info(`  variables: ${plain.length > 0 ? plain.join(", ") : "-"}`);

  const secret = [...spec.placeholders.secret];
  log.info(`  prompts:   ${secret.length > 0 ? secret.join(", ") : "-"}`);

  return details;
}
