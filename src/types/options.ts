/**
 * Option type definitions for dockspec operations.
 */

/** How the wipe operation destroys the artifact. */
export type WipeMethod = "overwrite" | "shred";

export const WIPE_METHODS: readonly WipeMethod[] = ["overwrite", "shred"];

export function isWipeMethod(value: string): value is WipeMethod {
  return WIPE_METHODS.some((method) => method === value);
}

/** Options for wiping the artifact. */
export interface WipeOptions {
  /** Default: overwrite */
  method?: WipeMethod;
  /** Base for a relative or omitted location (default: process.cwd()) */
  cwd?: string;
}
