/**
 * Manifest of credential values injected into a composed Dockerfile.
 *
 * Records where each secret landed so the artifact can be redacted or wiped
 * without re-parsing it. Lives in memory only.
 */

import type { SecretValue } from "./secret-value.js";

/** One substituted occurrence of a secret. */
export interface SecretOccurrence {
  /** 1-based line in the final text. */
  line: number;
  /** 1-based column (UTF-16 code units) in that line. */
  column: number;
  /** UTF-8 byte offset of the first byte in the written file. */
  start: number;
  /** UTF-8 byte offset one past the last byte. */
  end: number;
}

interface ManifestEntry {
  value: SecretValue;
  occurrences: SecretOccurrence[];
}

export class SecretManifest {
  private readonly entries = new Map<string, ManifestEntry>();
  private clearedFlag = false;

  /** Register the value obtained for a secret key. */
  add(key: string, value: SecretValue): void {
    this.entries.set(key, { value, occurrences: [] });
  }

  value(key: string): SecretValue | undefined {
    return this.entries.get(key)?.value;
  }

  recordOccurrence(key: string, occurrence: SecretOccurrence): void {
    this.entries.get(key)?.occurrences.push(occurrence);
  }

  /** Secret keys in the order they were obtained. */
  get keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  get cleared(): boolean {
    return this.clearedFlag;
  }

  occurrences(key: string): readonly SecretOccurrence[] {
    return this.entries.get(key)?.occurrences ?? [];
  }

  /** All occurrences of every key, ordered by position. */
  allOccurrences(): SecretOccurrence[] {
    return [...this.entries.values()]
      .flatMap((entry) => entry.occurrences)
      .sort((a, b) => a.start - b.start);
  }

  /**
   * Zero every held value and forget all entries. Safe to call repeatedly.
   */
  clear(): void {
    for (const entry of this.entries.values()) {
      entry.value.dispose();
    }
    this.entries.clear();
    this.clearedFlag = true;
  }
}

/**
 * Replace every recorded secret range in `text` with a mask.
 */
export function redactText(text: string, manifest: SecretManifest, mask = "********"): string {
  const bytes = Buffer.from(text, "utf-8");
  const parts: string[] = [];
  let cursor = 0;
  for (const { start, end } of manifest.allOccurrences()) {
    parts.push(bytes.subarray(cursor, start).toString("utf-8"), mask);
    cursor = end;
  }
  parts.push(bytes.subarray(cursor).toString("utf-8"));
  return parts.join("");
}
