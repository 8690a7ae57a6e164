/**
 * Placeholder syntax: `{{ KEY }}` with optional inner spaces or tabs.
 *
 * Dockerfile's own `${VAR}` references never match.
 */

import { isSecretKey } from "./validation.js";

function placeholderPattern(): RegExp {
  return /\{\{[ \t]*([A-Za-z_][A-Za-z0-9_]*)[ \t]*\}\}/g;
}

/** A placeholder occurrence inside a string (UTF-16 offsets). */
export interface PlaceholderMatch {
  key: string;
  index: number;
  length: number;
}

export function findPlaceholders(text: string): PlaceholderMatch[] {
  const matches: PlaceholderMatch[] = [];
  for (const match of text.matchAll(placeholderPattern())) {
    const key = match[1];
    if (key !== undefined && match.index !== undefined) {
      matches.push({ key, index: match.index, length: match[0].length });
    }
  }
  return matches;
}

/**
 * Distinct keys in first-appearance order, partitioned into plain and secret.
 */
export function scanPlaceholders(texts: readonly string[]): { plain: string[]; secret: string[] } {
  const plain: string[] = [];
  const secret: string[] = [];
  for (const text of texts) {
    for (const { key } of findPlaceholders(text)) {
      const bucket = isSecretKey(key) ? secret : plain;
      if (!bucket.includes(key)) {
        bucket.push(key);
      }
    }
  }
  return { plain, secret };
}

/**
 * Replace every placeholder for which `valueFor` returns a string.
 * Placeholders mapped to undefined are left untouched.
 */
export function replacePlaceholders(
  text: string,
  valueFor: (key: string) => string | undefined
): string {
  return text.replace(placeholderPattern(), (marker: string, key: string) => valueFor(key) ?? marker);
}
