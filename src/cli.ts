#!/usr/bin/env node
/**
 * CLI entry point for dockspec.
 *
 * Commander.js-based CLI with all commands and options.
 */

import { Command } from "commander";

import { VERSION } from "./constants.js";
import { reportError } from "./error-handler.js";
import { enableQuietMode, LogLevel, setLogLevel } from "./logger.js";
import { parseAssignmentStrict } from "./validation.js";
import { runBuild, type BuildFlags } from "./commands/build.js";
import { runList } from "./commands/list.js";
import { runRender } from "./commands/render.js";
import { collect, type LookupFlags } from "./commands/shared.js";
import { runShow } from "./commands/show.js";
import { runWipe, type WipeFlags } from "./commands/wipe.js";

/**
 * Run a command action, reporting failures through the error handler.
 */
async function guarded(operation: string, action: () => unknown): Promise<void> {
  try {
    await action();
  } catch (error: unknown) {
    process.exitCode = reportError(error, operation);
  }
}

/** Validates --set values as they are parsed (throws ValidationError). */
function collectAssignment(value: string, previous: string[] | undefined): string[] {
  parseAssignmentStrict(value);
  return collect(value, previous);
}

const program = new Command();

program
  .name("dockspec")
  .description("Compose Dockerfile specifications into a Dockerfile, then wipe it")
  .version(VERSION)
  .option("-q, --quiet", "Suppress all output (exit code only)")
  .option("-v, --verbose", "Show debug output (search path, composition order)")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<{ quiet?: boolean; verbose?: boolean }>();
    if (opts.quiet) {
      enableQuietMode();
    } else if (opts.verbose) {
      setLogLevel(LogLevel.DEBUG);
    }
  });

program
  .command("build")
  .description("Compose a specification and write the Dockerfile (prompts for credentials)")
  .argument("<name>", "Specification name")
  .option("-o, --output <dir>", "Directory receiving the Dockerfile")
  .option("--spec-dir <dir>", "Search this directory first (repeatable)", collect)
  .option("--set <KEY=VALUE>", "Value for a placeholder (repeatable)", collectAssignment)
  .option("--show", "Print the written Dockerfile with credentials masked")
  .action(async (name: string, options: BuildFlags) => {
    await guarded(`build '${name}'`, () => runBuild(name, options));
  });

program
  .command("render")
  .description("Print the composed Dockerfile without prompting or writing")
  .argument("<name>", "Specification name")
  .option("--spec-dir <dir>", "Search this directory first (repeatable)", collect)
  .option("--set <KEY=VALUE>", "Value for a placeholder (repeatable)", collectAssignment)
  .action(async (name: string, options: LookupFlags) => {
    await guarded(`render '${name}'`, () => runRender(name, options));
  });

program
  .command("wipe")
  .description("Destroy the generated Dockerfile (default: ./Dockerfile)")
  .argument("[path]", "Dockerfile or directory containing it")
  .option("--shred", "Use the platform's secure-removal utility (wipe/gwipe)")
  .action(async (path: string | undefined, options: WipeFlags) => {
    await guarded("wipe the Dockerfile", () => runWipe(path, options));
  });

program
  .command("list")
  .description("List specifications available on the search path")
  .option("--spec-dir <dir>", "Search this directory first (repeatable)", collect)
  .action(async (options: LookupFlags) => {
    await guarded("list specifications", () => runList(options));
  });

program
  .command("show")
  .description("Show where a specification lives, what it includes and needs")
  .argument("<name>", "Specification name")
  .option("--spec-dir <dir>", "Search this directory first (repeatable)", collect)
  .option("--set <KEY=VALUE>", "Value for a placeholder (repeatable)", collectAssignment)
  .action(async (name: string, options: LookupFlags) => {
    await guarded(`show '${name}'`, () => runShow(name, options));
  });

// Parse and run (async for proper error handling in async actions)
try {
  await program.parseAsync();
} catch (error: unknown) {
  process.exitCode = reportError(error, "parse arguments");
}
