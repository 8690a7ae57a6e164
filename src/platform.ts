/**
 * Cross-platform detection for dockspec.
 *
 * Picks the secure-removal utility for the host and locates executables on
 * PATH.
 *
 * Dependency direction:
 *   This module has minimal internal dependencies (near-leaf module).
 *   It should NOT import from: cli, engine
 */

import { accessSync, constants as fsConstants, statSync } from "node:fs";
import { platform } from "node:os";
import { delimiter, join } from "node:path";

import { LINUX_SAFE_REMOVAL, MACOS_SAFE_REMOVAL } from "./constants.js";

/** Supported host platform types. */
export type HostPlatform = "linux" | "macos" | "windows" | "other";

export function detectHostPlatform(os: NodeJS.Platform = platform()): HostPlatform {
  switch (os) {
    case "linux":
      return "linux";
    case "darwin":
      return "macos";
    case "win32":
      return "windows";
    default:
      return "other";
  }
}

/**
 * Secure-removal utility for the host (`wipe` on Linux, `gwipe` on macOS),
 * or null where none is known.
 */
export function getSafeRemovalCommand(host: HostPlatform = detectHostPlatform()): string | null {
  switch (host) {
    case "linux":
      return LINUX_SAFE_REMOVAL;
    case "macos":
      return MACOS_SAFE_REMOVAL;
    default:
      return null;
  }
}

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) {return false;}
    accessSync(path, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Absolute path of `name` on PATH, or null when not found.
 */
export function findExecutable(name: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const dirs = (env.PATH ?? "").split(delimiter).filter(Boolean);
  for (const dir of dirs) {
    const candidate = join(dir, name);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * The host's secure-removal utility on PATH, or null when it is missing.
 */
export function findSafeRemovalUtility(env: NodeJS.ProcessEnv = process.env): string | null {
  const command = getSafeRemovalCommand();
  return command ? findExecutable(command, env) : null;
}
