/**
 * Lightweight prompt utilities using node:readline.
 *
 * Provides the terminal-backed credential source used by the CLI.
 */

import { createInterface } from "node:readline";
import { Writable } from "node:stream";

import { CredentialUnavailableError } from "./errors.js";
import type { CredentialRequest, CredentialSource } from "./interfaces/credential-source.js";
import { log } from "./logger.js";

/** Printed once before the first credential prompt of a run. */
export const CREDENTIAL_WARNING =
  "Credentials entered below will appear in the generated Dockerfile. " +
  "Run `dockspec wipe` as soon as the image is built.";

/** Swallows everything readline echoes while a hidden value is typed. */
function mutedOutput(): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
}

/**
 * Ask one question on the terminal.
 *
 * @returns The answer, or undefined when input ends or Ctrl+C is pressed.
 */
function ask(prompt: string, hidden: boolean): Promise<string | undefined> {
  return new Promise((resolve) => {
    let answered = false;
    if (hidden) {
      process.stdout.write(prompt);
    }
    const rl = createInterface({
      input: process.stdin,
      output: hidden ? mutedOutput() : process.stdout,
      terminal: Boolean(process.stdin.isTTY),
    });

    rl.on("SIGINT", () => rl.close());
    rl.on("close", () => {
      if (!answered) {
        if (hidden) {process.stdout.write("\n");}
        resolve(undefined);
      }
    });
    rl.question(hidden ? "" : prompt, (answer) => {
      answered = true;
      if (hidden) {process.stdout.write("\n");}
      rl.close();
      resolve(answer);
    });
  });
}

/**
 * Reads credentials from the controlling terminal.
 * Fails fast when stdin is not a TTY (CI, pipes).
 */
export class TerminalCredentialSource implements CredentialSource {
  private warned = false;

  async obtain({ key, hidden }: CredentialRequest): Promise<string | undefined> {
    if (!process.stdin.isTTY) {
      throw new CredentialUnavailableError(key, "no interactive terminal (stdin is not a TTY)");
    }
    if (!this.warned) {
      log.warn(CREDENTIAL_WARNING);
      this.warned = true;
    }

    const answer = await ask(`${key}: `, hidden);
    if (answer === undefined) {
      throw new CredentialUnavailableError(key, "prompt aborted");
    }
    return answer;
  }
}
