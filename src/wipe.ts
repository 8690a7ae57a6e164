/**
 * Wipe operation for dockspec.
 *
 * Destroys the one artifact path it is given and clears the in-memory
 * manifest of injected secrets. It never scans for or touches other files:
 * calling wipe promptly after the image build is the caller's job.
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  lstatSync,
  openSync,
  statSync,
  unlinkSync,
  writeSync,
  type Stats,
} from "node:fs";
import { join, resolve } from "node:path";

import { execa } from "execa";

import { DOCKERFILE_NAME, NO_SAFE_REMOVAL_MESSAGE, SAFE_REMOVAL_TIMEOUT } from "./constants.js";
import { errnoCode, extractErrorDetails, WipeFailedError } from "./errors.js";
import { log } from "./logger.js";
import type { SecretManifest } from "./manifest.js";
import { findSafeRemovalUtility } from "./platform.js";
import type { WipeMethod, WipeOptions } from "./types/options.js";

export type WipeStatus = "removed" | "already-absent";

export interface WipeResult {
  status: WipeStatus;
  path: string;
  method: WipeMethod;
  /** True when a manifest was supplied and has been cleared. */
  manifestCleared: boolean;
}

const ZERO_CHUNK_SIZE = 64 * 1024;

/**
 * Resolve the artifact path: a directory means its Dockerfile, an omitted
 * location means the working directory's Dockerfile.
 */
export function resolveArtifactPath(location: string | undefined, cwd: string = process.cwd()): string {
  const target = resolve(cwd, location ?? DOCKERFILE_NAME);
  return statQuietly(target, true)?.isDirectory() ? join(target, DOCKERFILE_NAME) : target;
}

/**
 * Stats of `path`, or undefined when nothing can exist there (ENOENT, or a
 * parent that is not a directory).
 */
function statQuietly(path: string, followLinks: boolean): Stats | undefined {
  try {
    return followLinks ? statSync(path, { throwIfNoEntry: false }) : lstatSync(path, { throwIfNoEntry: false });
  } catch (error: unknown) {
    if (errnoCode(error) === "ENOTDIR") {return undefined;}
    throw error;
  }
}

/**
 * Overwrite the whole file with zeros, flush, then unlink.
 */
function overwriteAndUnlink(path: string, size: number): void {
  const zeros = Buffer.alloc(Math.min(size, ZERO_CHUNK_SIZE));
  const fd = openSync(path, "r+");
  try {
    for (let offset = 0; offset < size; offset += zeros.length) {
      writeSync(fd, zeros, 0, Math.min(zeros.length, size - offset), offset);
    }
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
  unlinkSync(path);
}

/**
 * Remove the file with the platform's secure-removal utility.
 */
async function shredWithUtility(path: string, env: NodeJS.ProcessEnv): Promise<void> {
  const executable = findSafeRemovalUtility(env);
  if (!executable) {
    throw new WipeFailedError(path, NO_SAFE_REMOVAL_MESSAGE);
  }

  log.debug(`Running ${executable} on ${path}`);
  const result = await execa(executable, ["-f", path], {
    timeout: SAFE_REMOVAL_TIMEOUT,
    env,
    reject: false,
    stdin: "ignore",
  });
  if (result.exitCode !== 0) {
    const details = result.stderr.trim() || `exit code ${String(result.exitCode)}`;
    throw new WipeFailedError(path, details);
  }
}

/**
 * Remove the artifact at `location` and clear `manifest`.
 *
 * Idempotent: a missing artifact reports `already-absent`. The manifest is
 * cleared on every exit path, failures included.
 *
 * @throws WipeFailedError when the file exists but could not be destroyed.
 */
export async function wipeArtifact(
  location?: string,
  manifest?: SecretManifest,
  options: WipeOptions & { env?: NodeJS.ProcessEnv } = {}
): Promise<WipeResult> {
  const method = options.method ?? "overwrite";
  let path = resolve(options.cwd ?? process.cwd(), location ?? DOCKERFILE_NAME);

  try {
    path = resolveArtifactPath(location, options.cwd);
    const stats = statQuietly(path, false);
    if (!stats) {
      log.debug(`${path} already absent`);
      return { status: "already-absent", path, method, manifestCleared: manifest !== undefined };
    }
    if (!stats.isFile()) {
      throw new WipeFailedError(path, "not a regular file");
    }

    if (method === "shred") {
      await shredWithUtility(path, options.env ?? process.env);
    } else {
      overwriteAndUnlink(path, stats.size);
    }

    if (existsSync(path)) {
      throw new WipeFailedError(path, "file still present after removal");
    }
    return { status: "removed", path, method, manifestCleared: manifest !== undefined };
  } catch (error: unknown) {
    if (error instanceof WipeFailedError) {throw error;}
    throw new WipeFailedError(path, extractErrorDetails(error));
  } finally {
    manifest?.clear();
  }
}
