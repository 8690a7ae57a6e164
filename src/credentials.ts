/**
 * Credential injector.
 *
 * Obtains each distinct secret placeholder value once, substitutes it into
 * the composed text and records every substituted range in a manifest.
 * Values are never logged. On any failure the values obtained so far are
 * zeroed before the error propagates.
 */

import type { CompositionResult } from "./composer.js";
import { HIDDEN_INPUT_HINTS } from "./constants.js";
import { CredentialUnavailableError, extractErrorDetails } from "./errors.js";
import type { CredentialSource } from "./interfaces/credential-source.js";
import { log } from "./logger.js";
import { SecretManifest } from "./manifest.js";
import { findPlaceholders } from "./placeholders.js";
import { SecretValue } from "./secret-value.js";

/** Fully substituted composition plus the manifest of injected secrets. */
export interface InjectedComposition extends CompositionResult {
  manifest: SecretManifest;
}

/** Whether a secret key should be read with echo suppressed. */
export function isHiddenKey(key: string): boolean {
  const upper = key.toUpperCase();
  return HIDDEN_INPUT_HINTS.some((hint) => upper.includes(hint));
}

async function obtainValue(source: CredentialSource, key: string): Promise<SecretValue> {
  let value: string | undefined;
  try {
    value = await source.obtain({ key, hidden: isHiddenKey(key) });
  } catch (error: unknown) {
    if (error instanceof CredentialUnavailableError) {throw error;}
    throw new CredentialUnavailableError(key, extractErrorDetails(error));
  }
  if (value === undefined) {
    throw new CredentialUnavailableError(key, "no input available");
  }
  if (value === "") {
    throw new CredentialUnavailableError(key, "empty value");
  }
  // eslint-disable-next-line no-control-regex
  if (/[\r\n\x00]/.test(value)) {
    throw new CredentialUnavailableError(key, "value contains a line break or null byte");
  }
  return new SecretValue(value);
}

/**
 * Substitute manifest values into `text`, recording each occurrence.
 */
function fillSecrets(text: string, manifest: SecretManifest): string {
  const out: string[] = [];
  let cursor = 0;
  let byteOffset = 0;
  let line = 1;
  let column = 0;

  const append = (segment: string): void => {
    out.push(segment);
    byteOffset += Buffer.byteLength(segment, "utf-8");
    const lastNewline = segment.lastIndexOf("\n");
    if (lastNewline === -1) {
      column += segment.length;
    } else {
      line += segment.split("\n").length - 1;
      column = segment.length - lastNewline - 1;
    }
  };

  for (const match of findPlaceholders(text)) {
    const secret = manifest.value(match.key);
    if (!secret) {continue;}

    append(text.slice(cursor, match.index));
    const start = byteOffset;
    manifest.recordOccurrence(match.key, {
      line,
      column: column + 1,
      start,
      end: start + secret.byteLength,
    });
    append(secret.reveal());
    cursor = match.index + match.length;
  }
  append(text.slice(cursor));

  return out.join("");
}

/**
 * Fill every pending secret placeholder of a composition.
 *
 * @throws CredentialUnavailableError naming the key that could not be obtained.
 */
export async function injectCredentials(
  result: CompositionResult,
  source: CredentialSource
): Promise<InjectedComposition> {
  const manifest = new SecretManifest();
  try {
    for (const key of result.pendingSecrets) {
      manifest.add(key, await obtainValue(source, key));
    }
    const text = fillSecrets(result.text, manifest);
    if (manifest.size > 0) {
      log.debug(`Injected ${manifest.size} credential(s) at ${manifest.allOccurrences().length} location(s)`);
    }
    return { ...result, text, manifest };
  } catch (error: unknown) {
    manifest.clear();
    throw error;
  }
}
