/**
 * Engine configuration for dockspec.
 *
 * Process environment, configuration file and CLI flags are read once here
 * into an explicit EngineConfig that the engine passes down the call chain.
 */

import { resolve } from "node:path";

import type { DockspecFileConfig } from "./config-file.js";
import { DOCKSPEC_ENV, getBundledSpecsDir } from "./constants.js";
import { log } from "./logger.js";
import { resolveSearchPath, splitPathList, type SearchPath } from "./search-path.js";
import type { WipeMethod } from "./types/options.js";
import { isSecretKey, isValidPlaceholderKey, parseAssignmentStrict } from "./validation.js";

export interface EngineConfig {
  cwd: string;
  /** Raw DOCKSPEC_PATH value */
  envSpecPath?: string;
  bundledDir: string;
  /** Directories searched before DOCKSPEC_PATH entries */
  specDirs: string[];
  /** Plain placeholder values */
  variables: ReadonlyMap<string, string>;
  outputDir: string;
  wipeMethod: WipeMethod;
  /** Environment used to locate the secure-removal utility */
  env: NodeJS.ProcessEnv;
}

export interface ConfigInput {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  fileConfig?: DockspecFileConfig;
  /** --spec-dir values */
  specDirs?: string[];
  /** --set KEY=VALUE values */
  assignments?: string[];
  /** --output value */
  outputDir?: string;
  wipeMethod?: WipeMethod;
  /** Override for tests and embedding */
  bundledDir?: string;
}

/**
 * Plain placeholder values from DOCKSPEC_VAR_<KEY> environment entries.
 */
function variablesFromEnv(env: NodeJS.ProcessEnv): Map<string, string> {
  const values = new Map<string, string>();
  for (const [name, value] of Object.entries(env)) {
    if (!name.startsWith(DOCKSPEC_ENV.VAR_PREFIX) || value === undefined) {continue;}
    const key = name.slice(DOCKSPEC_ENV.VAR_PREFIX.length);
    if (!isValidPlaceholderKey(key) || isSecretKey(key)) {
      log.warn(`Ignoring ${name}: not usable as a plain placeholder value`);
      continue;
    }
    values.set(key, value);
  }
  return values;
}

/**
 * Build the engine configuration.
 *
 * Variable precedence: --set > config file vars > DOCKSPEC_VAR_<KEY>.
 * Search directories: --spec-dir, then config file specPath, then DOCKSPEC_PATH.
 */
export function createConfig(input: ConfigInput = {}): EngineConfig {
  const env = input.env ?? process.env;
  const cwd = resolve(input.cwd ?? process.cwd());
  const file = input.fileConfig ?? {};

  const variables = variablesFromEnv(env);
  for (const [key, value] of Object.entries(file.vars ?? {})) {
    variables.set(key, value);
  }
  for (const assignment of input.assignments ?? []) {
    const { key, value } = parseAssignmentStrict(assignment);
    variables.set(key, value);
  }

  return {
    cwd,
    envSpecPath: env[DOCKSPEC_ENV.PATH],
    bundledDir: input.bundledDir ?? getBundledSpecsDir(),
    specDirs: [...(input.specDirs ?? []), ...splitPathList(file.specPath)],
    variables,
    outputDir: resolve(cwd, input.outputDir ?? file.output ?? "."),
    wipeMethod: input.wipeMethod ?? file.wipeMethod ?? "overwrite",
    env,
  };
}

export function searchPathFor(config: EngineConfig): SearchPath {
  return resolveSearchPath({
    envValue: config.envSpecPath,
    cwd: config.cwd,
    bundledDir: config.bundledDir,
    extraDirs: config.specDirs,
  });
}
