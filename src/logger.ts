/**
 * Unified logging abstraction for dockspec.
 *
 * Centralizes all console output with consistent styling and log levels.
 * Uses picocolors for terminal styling.
 *
 * IMPORTANT: All dockspec output MUST go through this module, and secret
 * values MUST NEVER be passed to it.
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/** Logger configuration. */
interface LoggerConfig {
  level: LogLevel;
  /** If true, suppress ALL output including errors */
  quiet: boolean;
}

const config: LoggerConfig = {
  level: LogLevel.INFO,
  quiet: false,
};

function canOutput(level: LogLevel): boolean {
  return !config.quiet && config.level <= level;
}

/**
 * Enable quiet mode: suppress ALL output.
 * Only exit codes communicate success/failure.
 */
export function enableQuietMode(): void {
  config.quiet = true;
  config.level = LogLevel.SILENT;
}

/**
 * Disable quiet mode: restore normal output.
 */
export function disableQuietMode(): void {
  config.quiet = false;
  config.level = LogLevel.INFO;
}

/**
 * Set the minimum log level. Messages below this level are suppressed.
 */
export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

/**
 * Logger object with level-aware methods.
 *
 * Usage:
 *   log.debug("verbose info")
 *   log.info("normal output")
 *   log.warn("warning message")
 *   log.error("error message")
 *   log.success("completed!")
 */
export const log = {
  /** Debug-level message, dim. */
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      console.error(pc.dim(message));
    }
  },

  info(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(message);
    }
  },

  /** Warning-level message, yellow on stderr. */
  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      console.warn(pc.yellow(message));
    }
  },

  /** Error-level message, red on stderr. */
  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      console.error(pc.red(message));
    }
  },

  success(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.green(message));
    }
  },

  dim(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.dim(message));
    }
  },

  bold(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.bold(message));
    }
  },

  yellow(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.yellow(message));
    }
  },

  /**
   * Raw output without styling (generated Dockerfile text, listings).
   * Respects log level (info).
   */
  raw(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(message);
    }
  },
};

/**
 * Styled string builders (for complex compositions).
 *
 * Usage:
 *   log.raw(`${style.cyan(name)} ${style.dim(location)}`)
 */
export const style = {
  dim: (text: string) => pc.dim(text),
  bold: (text: string) => pc.bold(text),
  yellow: (text: string) => pc.yellow(text),
  cyan: (text: string) => pc.cyan(text),
  cyanBold: (text: string) => pc.bold(pc.cyan(text)),
};
