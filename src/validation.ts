/**
 * Input validation utilities for dockspec.
 *
 * Centralized validation for placeholder keys, KEY=VALUE assignments and
 * specification names.
 *
 * Dependency direction:
 *   This module imports from: constants.ts, errors.ts
 *   It should NOT import from: cli, engine, composer
 */

import { SECRET_KEY_PREFIX } from "./constants.js";
import { ValidationError } from "./errors.js";

/** Placeholder key pattern (same shape as a POSIX environment variable name). */
export const PLACEHOLDER_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Specification names: no path separators, no leading dot. */
const SPEC_NAME_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.+-]*$/;

export function isValidPlaceholderKey(key: string): boolean {
  return PLACEHOLDER_KEY_PATTERN.test(key);
}

/**
 * Whether a placeholder key is filled by the credential injector.
 */
export function isSecretKey(key: string): boolean {
  return key.startsWith(SECRET_KEY_PREFIX);
}

/**
 * Validate a specification name before it is turned into a file name.
 *
 * @throws ValidationError if the name could escape its search directory.
 */
export function validateSpecName(name: string): string {
  if (!SPEC_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      `Invalid specification name '${name}'. Use letters, digits, '_', '.', '+' or '-', without path separators.`
    );
  }
  return name;
}

/**
 * Parse and validate a KEY=VALUE assignment, throwing on invalid format.
 *
 * Secret keys are refused: credentials are only ever read interactively.
 *
 * @throws ValidationError if format or key is invalid.
 */
export function parseAssignmentStrict(assignment: string): { key: string; value: string } {
  const eqIdx = assignment.indexOf("=");
  if (eqIdx <= 0) {
    throw new ValidationError(`Invalid assignment '${assignment}'. Expected KEY=VALUE`);
  }

  const key = assignment.slice(0, eqIdx);
  if (!isValidPlaceholderKey(key)) {
    throw new ValidationError(
      `Invalid placeholder key '${key}'. Must be alphanumeric/underscore, starting with letter or underscore.`
    );
  }
  if (isSecretKey(key)) {
    throw new ValidationError(
      `'${key}' is a credential placeholder and cannot be set on the command line; it is prompted for.`
    );
  }

  return { key, value: assignment.slice(eqIdx + 1) };
}
