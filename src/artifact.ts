/**
 * Atomic artifact writes.
 *
 * The Dockerfile is written to a temporary sibling (mode 0600), flushed and
 * renamed over the target, so a failed write never leaves a partial file.
 */

import { randomBytes } from "node:crypto";
import { closeSync, existsSync, fsyncSync, mkdirSync, openSync, renameSync, unlinkSync, writeSync } from "node:fs";
import { dirname } from "node:path";

import { ARTIFACT_MODE } from "./constants.js";
import { ArtifactWriteFailedError, errnoCode } from "./errors.js";
import { log } from "./logger.js";

function removeTemp(tmp: string): void {
  try {
    if (existsSync(tmp)) {unlinkSync(tmp);}
  } catch (error: unknown) {
    log.warn(`Could not remove temporary file ${tmp}: ${errnoCode(error) ?? String(error)}`);
  }
}

/**
 * Write `content` to `filePath` atomically, replacing any previous file.
 *
 * @throws ArtifactWriteFailedError on any filesystem error.
 */
export function writeArtifact(filePath: string, content: string): void {
  const tmp = `${filePath}.tmp.${randomBytes(4).toString("hex")}`;
  const bytes = Buffer.from(content, "utf-8");

  try {
    mkdirSync(dirname(filePath), { recursive: true });
    const fd = openSync(tmp, "wx", ARTIFACT_MODE);
    try {
      writeSync(fd, bytes);
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmp, filePath);
  } catch (error: unknown) {
    removeTemp(tmp);
    throw new ArtifactWriteFailedError(filePath, error);
  } finally {
    bytes.fill(0);
  }
}
