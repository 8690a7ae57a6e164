/**
 * Configuration file support for dockspec.
 *
 * Loads settings from dockspec.yaml or .dockspecrc files.
 * Supports both per-project and global configuration.
 *
 * Config file locations (in order of precedence):
 *   1. ./dockspec.yaml (project-specific)
 *   2. ./dockspec.yml, ./.dockspecrc (project-specific, alternatives)
 *   3. ~/.dockspec/config.yaml (global)
 *
 * Example:
 *   specPath: ./specs:/opt/shared/specs
 *   output: ./build
 *   wipeMethod: shred
 *   vars:
 *     PYTHON_VERSION: "3.11"
 *
 * Dependency direction:
 *   This module imports from: errors.ts, logger.ts, validation.ts, types/options.ts
 *   It should NOT import from: cli, engine, composer
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import { ConfigError } from "./errors.js";
import { log } from "./logger.js";
import { isWipeMethod, type WipeMethod } from "./types/options.js";
import { isSecretKey, isValidPlaceholderKey } from "./validation.js";

/**
 * dockspec file configuration.
 * All fields are optional - CLI flags take precedence.
 */
export interface DockspecFileConfig {
  /** Colon-separated specification directories */
  specPath?: string;
  /** Directory receiving the Dockerfile */
  output?: string;
  wipeMethod?: WipeMethod;
  /** Plain placeholder values */
  vars?: Record<string, string>;
}

const PROJECT_CONFIG_FILES = ["dockspec.yaml", "dockspec.yml", ".dockspecrc"];
export const GLOBAL_CONFIG_PATH = join(homedir(), ".dockspec", "config.yaml");

function unquote(value: string): string {
  return value.trim().replace(/^["']|["']$/g, "");
}

/**
 * Parse YAML-like config (simple key: value format plus one `vars:` block).
 * Supports basic YAML without external dependencies.
 */
export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  let inVarsBlock = false;
  const vars: Record<string, string> = {};

  for (const rawLine of content.split("\n")) {
    const line = rawLine.replace(/\r$/, "");
    const trimmed = line.trim();
    if (trimmed.startsWith("#") || trimmed === "") {
      continue;
    }

    if (trimmed === "vars:") {
      inVarsBlock = true;
      continue;
    }

    // Indented entries belong to the vars block
    if (inVarsBlock && /^\s/.test(line)) {
      const varMatch = trimmed.match(/^([A-Za-z_][A-Za-z0-9_]*):\s*(.*)$/);
      const key = varMatch?.[1];
      const value = varMatch?.[2];
      if (key !== undefined && value !== undefined) {
        vars[key] = unquote(value);
      }
      continue;
    }
    inVarsBlock = false;

    const match = trimmed.match(/^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.*)$/);
    const key = match?.[1];
    const value = match?.[2];
    if (key === undefined || value === undefined) {continue;}

    const cleanValue = unquote(value);
    if (cleanValue === "true") {
      result[key] = true;
    } else if (cleanValue === "false") {
      result[key] = false;
    } else if (cleanValue !== "") {
      result[key] = cleanValue;
    }
  }

  if (Object.keys(vars).length > 0) {
    result.vars = vars;
  }

  return result;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.values(value).every((v) => typeof v === "string")
  );
}

/**
 * Map parsed values onto DockspecFileConfig.
 *
 * @throws ConfigError for an unknown wipe method or a credential key under vars.
 */
function toFileConfig(parsed: Record<string, unknown>, path: string): DockspecFileConfig {
  const config: DockspecFileConfig = {};

  if (typeof parsed.specPath === "string") {config.specPath = parsed.specPath;}
  if (typeof parsed.output === "string") {config.output = parsed.output;}
  if (typeof parsed.wipeMethod === "string") {
    if (!isWipeMethod(parsed.wipeMethod)) {
      throw new ConfigError(`${path}: unknown wipeMethod '${parsed.wipeMethod}' (expected overwrite or shred)`);
    }
    config.wipeMethod = parsed.wipeMethod;
  }
  if (isStringRecord(parsed.vars)) {
    for (const key of Object.keys(parsed.vars)) {
      if (!isValidPlaceholderKey(key) || isSecretKey(key)) {
        throw new ConfigError(`${path}: '${key}' cannot be set under vars`);
      }
    }
    config.vars = parsed.vars;
  }

  return config;
}

/**
 * Load configuration from file, or null when absent or unreadable.
 */
function loadConfigFile(path: string): DockspecFileConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (e) {
    log.debug(`Failed to read config file ${path}: ${String(e)}`);
    return null;
  }
  return toFileConfig(parseSimpleYaml(content), path);
}

function loadProjectConfig(projectPath: string): DockspecFileConfig | null {
  for (const filename of PROJECT_CONFIG_FILES) {
    const configPath = join(projectPath, filename);
    const config = loadConfigFile(configPath);
    if (config) {
      log.debug(`Loaded project config: ${configPath}`);
      return config;
    }
  }
  return null;
}

/**
 * Merge configurations with proper precedence.
 * Order: global < project < CLI flags
 */
export function mergeConfigs(...configs: (DockspecFileConfig | null)[]): DockspecFileConfig {
  const result: DockspecFileConfig = {};

  for (const config of configs) {
    if (!config) {continue;}

    if (config.specPath !== undefined) {result.specPath = config.specPath;}
    if (config.output !== undefined) {result.output = config.output;}
    if (config.wipeMethod !== undefined) {result.wipeMethod = config.wipeMethod;}

    // Vars: merge (later overrides same keys)
    if (config.vars) {
      result.vars = { ...(result.vars ?? {}), ...config.vars };
    }
  }

  return result;
}

/**
 * Load dockspec configuration.
 *
 * Loads and merges the global config and the project config found in
 * `projectPath`. CLI flags should be applied on top of the returned config.
 */
export function loadDockspecConfig(projectPath: string, globalPath = GLOBAL_CONFIG_PATH): DockspecFileConfig {
  const globalConfig = loadConfigFile(globalPath);
  if (globalConfig) {
    log.debug(`Loaded global config: ${globalPath}`);
  }
  const projectConfig = loadProjectConfig(projectPath);

  return mergeConfigs(globalConfig, projectConfig);
}
