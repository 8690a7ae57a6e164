/**
 * Unified error reporting for dockspec.
 *
 * Turns engine errors into a logged message, an actionable hint and a
 * process exit code.
 */

import { DOCKSPEC_ENV } from "./constants.js";
import {
  ArtifactWriteFailedError,
  ConfigError,
  CredentialUnavailableError,
  CyclicSpecificationError,
  DockspecError,
  InvalidSpecificationError,
  SpecificationNotFoundError,
  UnresolvedPlaceholderError,
  ValidationError,
  WipeFailedError,
} from "./errors.js";
import { log } from "./logger.js";

export const EXIT_FAILURE = 1;

/**
 * Suggestion shown under the error message, if any.
 */
export function hintFor(error: unknown): string | undefined {
  if (error instanceof SpecificationNotFoundError) {
    const searched = error.searchPath.map((dir) => `  ${dir}`).join("\n");
    return `Searched:\n${searched}\nAdd a directory with --spec-dir or ${DOCKSPEC_ENV.PATH}.`;
  }
  if (error instanceof CyclicSpecificationError) {
    return "Remove one of the include directives along the cycle.";
  }
  if (error instanceof UnresolvedPlaceholderError) {
    return (
      `Pass --set ${error.placeholder}=<value>, export ${DOCKSPEC_ENV.VAR_PREFIX}${error.placeholder}, ` +
      `or declare '#@ default ${error.placeholder}=<value>' in the specification.`
    );
  }
  if (error instanceof CredentialUnavailableError) {
    return "Credentials are only read from an interactive terminal. No Dockerfile was written.";
  }
  if (error instanceof ArtifactWriteFailedError) {
    return "Check that the output directory is writable, then retry. No partial Dockerfile was left.";
  }
  if (error instanceof InvalidSpecificationError) {
    return "Directives are: include, parent, default KEY=value, description.";
  }
  return undefined;
}

/**
 * Log an error with context.
 *
 * @param error - The error object
 * @param operation - What operation was being performed
 * @param details - Additional context (optional)
 */
export function logError(
  error: unknown,
  operation: string,
  details?: Record<string, unknown>
): void {
  const message = error instanceof Error ? error.message : String(error);

  log.error(`Failed to ${operation}: ${message}`);

  if (details) {
    const SENSITIVE_KEY_PATTERN = /(password|secret|token|key|auth|credential)/i;
    const detailsStr = Object.entries(details)
      .filter(([k]) => !SENSITIVE_KEY_PATTERN.test(k))
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(", ");
    log.dim(`Context: ${detailsStr}`);
  }

  if (error instanceof Error && error.stack) {
    log.debug(error.stack);
  }
}

/**
 * Report an error raised by a command and return the exit code to use.
 */
export function reportError(error: unknown, operation: string): number {
  if (error instanceof WipeFailedError) {
    logError(error, operation);
    log.warn(
      `SECURITY WARNING: ${error.path} may still contain credentials. ` +
        "Remove it manually and make sure no copy remains."
    );
    return EXIT_FAILURE;
  }

  if (error instanceof ValidationError || error instanceof ConfigError) {
    log.error(error.message);
    return EXIT_FAILURE;
  }

  logError(error, operation);
  const hint = hintFor(error);
  if (hint) {
    log.dim(hint);
  }
  if (!(error instanceof DockspecError)) {
    log.dim("This looks like a bug in dockspec; rerun with --verbose for the stack trace.");
  }
  return EXIT_FAILURE;
}
