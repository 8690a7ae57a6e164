/**
 * Constants module for dockspec.
 *
 * Shared names, file conventions and paths are defined here (SSOT).
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

// === Version (SSOT: package.json) ===
function readPackageVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

export const VERSION: string = readPackageVersion();

// === Environment Variables (SSOT for names) ===
export const DOCKSPEC_ENV = {
  // Colon-separated list of specification directories
  PATH: "DOCKSPEC_PATH",
  // Prefix for plain placeholder values: DOCKSPEC_VAR_<KEY>
  VAR_PREFIX: "DOCKSPEC_VAR_",
} as const;

// === Specification Bundles ===
export const SPEC_FILE_SUFFIX = ".docker_spec";
export const DIRECTIVE_MARKER = "#@";

// Placeholder keys starting with this prefix are filled by the credential injector
export const SECRET_KEY_PREFIX = "CREDENTIAL_";

// Secret keys containing any of these are read with echo suppressed
export const HIDDEN_INPUT_HINTS = ["PASSWORD", "PASSWD", "TOKEN", "SECRET"] as const;

// === Artifact ===
export const DOCKERFILE_NAME = "Dockerfile";
export const ARTIFACT_MODE = 0o600;

// === Secure Removal Utilities (per platform) ===
export const LINUX_SAFE_REMOVAL = "wipe";
export const MACOS_SAFE_REMOVAL = "gwipe";
export const SAFE_REMOVAL_TIMEOUT = 60_000; // ms
export const NO_SAFE_REMOVAL_MESSAGE =
  "no secure removal utility found (`wipe` on Linux, `gwipe` on macOS); install one or use the default overwrite method";

/** Directory holding the specifications bundled with the package. */
export function getBundledSpecsDir(): string {
  return fileURLToPath(new URL("../specs/", import.meta.url));
}
