/**
 * Option handling shared by the CLI commands.
 */

import { createConfig, type EngineConfig } from "../config.js";
import { GLOBAL_CONFIG_PATH, loadDockspecConfig } from "../config-file.js";
import type { WipeMethod } from "../types/options.js";

/** Flags accepted by the commands that look up specifications. */
export interface LookupFlags {
  specDir?: string[];
  set?: string[];
  output?: string;
}

/** Process context; overridden by tests. */
export interface CommandContext {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  globalConfigPath?: string;
}

/**
 * Engine configuration from config files plus command-line flags.
 */
export function configFromFlags(
  flags: LookupFlags,
  context: CommandContext = {},
  wipeMethod?: WipeMethod
): EngineConfig {
  const cwd = context.cwd ?? process.cwd();
  const fileConfig = loadDockspecConfig(cwd, context.globalConfigPath ?? GLOBAL_CONFIG_PATH);
  return createConfig({
    cwd,
    env: context.env ?? process.env,
    fileConfig,
    specDirs: flags.specDir,
    assignments: flags.set,
    outputDir: flags.output,
    wipeMethod,
  });
}

/** Commander collector for repeatable options. */
export function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}
