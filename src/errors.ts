/**
 * Unified exception hierarchy for dockspec.
 *
 * All custom exceptions inherit from DockspecError for consistent error handling.
 * CLI catches these and converts to user-friendly messages.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other dockspec modules.
 */

/**
 * Base exception for all dockspec errors.
 */
export class DockspecError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DockspecError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - Invalid configuration file values
 *   - Unknown wipe method
 */
export class ConfigError extends DockspecError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Input validation errors (malformed KEY=VALUE, bad specification names).
 */
export class ValidationError extends DockspecError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Raised when no search-path directory holds the named specification. */
export class SpecificationNotFoundError extends DockspecError {
  readonly specification: string;
  readonly searchPath: readonly string[];

  constructor(specification: string, searchPath: readonly string[], requiredBy?: string) {
    const via = requiredBy ? ` (included by '${requiredBy}')` : "";
    super(`Specification not found: '${specification}'${via}`);
    this.name = "SpecificationNotFoundError";
    this.specification = specification;
    this.searchPath = searchPath;
  }
}

/** Raised when the include graph of a specification contains a cycle. */
export class CyclicSpecificationError extends DockspecError {
  readonly specification: string;
  /** Names along the cycle; first and last entries are the same. */
  readonly cycle: readonly string[];

  constructor(specification: string, cycle: readonly string[]) {
    super(`Cyclic include in specification '${specification}': ${cycle.join(" -> ")}`);
    this.name = "CyclicSpecificationError";
    this.specification = specification;
    this.cycle = cycle;
  }
}

/** Raised when a plain placeholder has neither a configured value nor a default. */
export class UnresolvedPlaceholderError extends DockspecError {
  readonly specification: string;
  readonly placeholder: string;

  constructor(specification: string, placeholder: string) {
    super(`No value for placeholder '${placeholder}' used by specification '${specification}'`);
    this.name = "UnresolvedPlaceholderError";
    this.specification = specification;
    this.placeholder = placeholder;
  }
}

/** Raised when a secret placeholder value cannot be obtained interactively. */
export class CredentialUnavailableError extends DockspecError {
  readonly placeholder: string;
  readonly reason: string;

  constructor(placeholder: string, reason: string) {
    super(`Credential '${placeholder}' unavailable: ${reason}`);
    this.name = "CredentialUnavailableError";
    this.placeholder = placeholder;
    this.reason = reason;
  }
}

/** Raised when the generated Dockerfile cannot be written. */
export class ArtifactWriteFailedError extends DockspecError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to write ${path}: ${extractErrorDetails(cause)}`, { cause });
    this.name = "ArtifactWriteFailedError";
    this.path = path;
  }
}

/** Raised when the generated Dockerfile cannot be removed. */
export class WipeFailedError extends DockspecError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to wipe ${path}: ${extractErrorDetails(cause)}`, { cause });
    this.name = "WipeFailedError";
    this.path = path;
  }
}

/** Raised for malformed directives inside a specification bundle. */
export class InvalidSpecificationError extends DockspecError {
  readonly file: string;
  readonly line: number;

  constructor(file: string, line: number, message: string) {
    super(`${file}:${line}: ${message}`);
    this.name = "InvalidSpecificationError";
    this.file = file;
    this.line = line;
  }
}

/**
 * Extract error details from an unknown error for user-friendly messages.
 *
 * Handles execa-style errors with stderr/shortMessage, plus standard Error objects.
 * Truncates output to maxLength to avoid overwhelming log output.
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }

  if ("stderr" in error && typeof error.stderr === "string" && error.stderr) {
    return error.stderr.slice(0, maxLength);
  }
  if ("shortMessage" in error && typeof error.shortMessage === "string" && error.shortMessage) {
    return error.shortMessage.slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}

/**
 * Errno code of a Node.js system error, if any.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
